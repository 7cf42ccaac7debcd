/**
 * Resource Types - typed data shared between detectors during one scan.
 *
 * A scan creates a fresh registry; nothing survives into the next scan.
 * Multiple detectors can write to a Resource, any detector can read it.
 */

/**
 * Unique identifier for a Resource type.
 * Convention: 'domain:name' (e.g., 'lint:references').
 */
export type ResourceId = string;

export interface Resource {
  readonly id: ResourceId;
}

/**
 * Registry for Resources of a single scan.
 * The scan orchestrator creates one per scan and hands it to every detector.
 */
export interface ResourceRegistry {
  /**
   * Get or create a Resource by ID.
   * The factory is only called when the Resource doesn't exist yet.
   */
  getOrCreate<T extends Resource>(id: ResourceId, factory: () => T): T;

  /**
   * Get a Resource without creating it.
   */
  get<T extends Resource>(id: ResourceId): T | undefined;

  has(id: ResourceId): boolean;
}
