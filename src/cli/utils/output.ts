/**
 * Shared plumbing for CLI commands
 */

import type { MigrateConfig } from '../../config/types.js';
import type { ReportLine } from '../../migration/report.js';
import { OciRegistryClient } from '../../registry/oci-client.js';
import { logger } from '../../utils/logger.js';

export function printReport(lines: readonly ReportLine[]): void {
  for (const line of lines) {
    if (line.outcome) {
      logger.step(line.outcome, line.text);
    } else {
      logger.log(line.text);
    }
  }
}

export function createRegistryClient(config: MigrateConfig): OciRegistryClient {
  return new OciRegistryClient({
    baseUrl: config.registry.url,
    token: config.registry.token,
    timeoutMs: config.registry.timeoutMs,
    retry: config.retry,
  });
}
