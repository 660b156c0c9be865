/**
 * Serialized, versioned form of a fitted regressor. The payload is owned by the
 * algorithm that produced it; stores treat it as an opaque blob.
 */
export interface ModelArtifact {
  version: number;
  algorithm: string;
  trainedAt: string;
  sampleCount: number;
  payload: Record<string, unknown>;
}
