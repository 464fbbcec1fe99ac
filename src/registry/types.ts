/**
 * Registry collaborator contract and the OCI document shapes it returns
 */

export const MEDIA_TYPE_OCI_IMAGE_INDEX_V1 = 'application/vnd.oci.image.index.v1+json';
export const MEDIA_TYPE_OCI_IMAGE_MANIFEST_V1 = 'application/vnd.oci.image.manifest.v1+json';

export type Annotations = Record<string, string>;

export interface OciDescriptor {
  mediaType: string;
  digest: string;
  size: number;
  annotations?: Annotations;
  artifactType?: string;
}

export interface OciManifest {
  schemaVersion: number;
  mediaType?: string;
  artifactType?: string;
  config?: OciDescriptor;
  layers: OciDescriptor[];
  annotations?: Annotations;
}

export interface OciImageIndex {
  schemaVersion: number;
  mediaType?: string;
  manifests: OciDescriptor[];
  annotations?: Annotations;
}

/**
 * One entry of a repository's tag listing.
 */
export interface TagInfo {
  name: string;
  /** Manifest digest the tag points at, e.g. `sha256:...` */
  digest: string;
  /** Creation time in epoch seconds, when the registry reports one */
  createdAt?: number;
}

/**
 * Capability consumed by discovery and fetching. Authentication and
 * transport are the implementation's concern.
 */
export interface RegistryClient {
  /** All active tags of `repository`, in the registry's listing order */
  listTags(repository: string): Promise<TagInfo[]>;
  getManifest(repository: string, reference: string): Promise<OciManifest>;
  getBlob(repository: string, digest: string): Promise<Uint8Array>;
  /** Manifests referring to `digest`, optionally filtered by artifact type */
  listReferrers(repository: string, digest: string, artifactType?: string): Promise<OciImageIndex>;
}
