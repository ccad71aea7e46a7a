export type EmbeddingDevice = 'webgpu' | null;

/**
 * Resolve the embedding device from a `cpu` / `gpu` setting.
 *
 * Returns 'webgpu' when GPU is requested, or null for CPU (default).
 * Callers pass the value in (QUECAT_EMBEDDING_DEVICE, a CLI flag).
 */
export function resolveEmbeddingDevice(setting?: string): EmbeddingDevice {
  const value = setting?.toLowerCase().trim();

  if (!value || value === 'cpu') return null;
  if (value === 'gpu') return 'webgpu';

  throw new Error(`Invalid embedding device: "${value}". Valid values: cpu, gpu`);
}
