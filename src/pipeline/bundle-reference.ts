/**
 * Task bundle image references: `<repository>[:<tag>][@<digest>]`
 */

export interface BundleReference {
  repository: string;
  tag?: string;
  digest?: string;
}

export function parseBundleReference(reference: string): BundleReference {
  const at = reference.indexOf('@');
  const withoutDigest = at === -1 ? reference : reference.slice(0, at);
  const digest = at === -1 ? undefined : reference.slice(at + 1);

  // A colon after the last slash separates the tag; earlier ones belong to a host:port
  const lastSlash = withoutDigest.lastIndexOf('/');
  const colon = withoutDigest.indexOf(':', lastSlash + 1);
  const repository = colon === -1 ? withoutDigest : withoutDigest.slice(0, colon);
  const tag = colon === -1 ? undefined : withoutDigest.slice(colon + 1);

  return {
    repository,
    ...(tag ? { tag } : {}),
    ...(digest ? { digest } : {}),
  };
}

export function formatBundleReference(ref: BundleReference): string {
  let result = ref.repository;
  if (ref.tag) result += `:${ref.tag}`;
  if (ref.digest) result += `@${ref.digest}`;
  return result;
}
