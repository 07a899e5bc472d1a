/**
 * @module @pagesmith/deploy-core/artifact/types
 */

/**
 * Relative file path → text content. Never empty once it leaves the producer stage.
 */
export type Artifact = Readonly<Record<string, string>>;

/**
 * What the tolerant parser made of a generation response
 */
export type ParsedArtifact =
  | { kind: 'valid'; files: Artifact; dropped: string[] }
  | { kind: 'unusable'; reason: string };

/**
 * Artifact handed to the provisioner, tagged with where it came from
 */
export type ArtifactResult =
  | { source: 'producer'; files: Artifact }
  | { source: 'fallback'; files: Artifact; reason: string };

export interface ArtifactRequest {
  taskId: string;
  brief: string;
}

/**
 * Produces the files for a job. Implementations may throw; the orchestrator
 * substitutes the fallback artifact when they do.
 */
export interface ArtifactProducer {
  produce(request: ArtifactRequest): Promise<ArtifactResult>;
}
