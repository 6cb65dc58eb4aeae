import { z } from 'zod';
import type { ImageMetadataSource } from '../types.js';
import { GoogleApiClient } from './base-client.js';

const REGISTRY_API = 'https://artifactregistry.googleapis.com/v1';

export interface ArtifactImageRef {
  location: string;
  project: string;
  repository: string;
  image: string;
  tag?: string;
  digest?: string;
}

const TagSchema = z.object({ version: z.string() }).passthrough();
const DockerImageSchema = z
  .object({ imageSizeBytes: z.string().optional() })
  .passthrough();

/**
 * Parse `LOCATION-docker.pkg.dev/PROJECT/REPO/IMAGE[:TAG][@DIGEST]`.
 * Returns null for references outside Artifact Registry.
 */
export function parseArtifactImageRef(ref: string): ArtifactImageRef | null {
  const match =
    /^([a-z0-9-]+)-docker\.pkg\.dev\/([^/]+)\/([^/]+)\/([^:@]+)(?::([^@]+))?(?:@(sha256:[0-9a-f]{64}))?$/.exec(
      ref
    );
  if (!match) return null;
  const [, location, project, repository, image] = match;
  const tag: string | undefined = match[5];
  const digest: string | undefined = match[6];
  return {
    location,
    project,
    repository,
    image,
    tag: digest ? tag : (tag ?? 'latest'),
    digest
  };
}

/**
 * Resolves compressed image sizes through a direct metadata lookup: tag to
 * digest, then the docker image record.
 */
export class ArtifactRegistryClient
  extends GoogleApiClient
  implements ImageMetadataSource
{
  async imageSizeBytes(image: string, signal?: AbortSignal): Promise<number | null> {
    const ref = parseArtifactImageRef(image);
    if (!ref) return null;

    const repoPath = `projects/${ref.project}/locations/${ref.location}/repositories/${ref.repository}`;
    const encodedImage = encodeURIComponent(ref.image);

    let digest = ref.digest;
    if (!digest && ref.tag) {
      const tag = await this.requestOrNull(
        'tags.get',
        `${REGISTRY_API}/${repoPath}/packages/${encodedImage}/tags/${encodeURIComponent(ref.tag)}`,
        TagSchema,
        signal
      );
      if (!tag) return null;
      digest = tag.version.slice(tag.version.lastIndexOf('/') + 1);
    }
    if (!digest) return null;

    const record = await this.requestOrNull(
      'dockerImages.get',
      `${REGISTRY_API}/${repoPath}/dockerImages/${encodedImage}@${digest}`,
      DockerImageSchema,
      signal
    );
    if (!record?.imageSizeBytes) return null;

    const size = Number(record.imageSizeBytes);
    return Number.isFinite(size) ? size : null;
  }
}
