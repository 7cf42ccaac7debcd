import type { Resource, ResourceId, ResourceRegistry as IResourceRegistry } from '@graphlint/types';

/**
 * In-memory Resource registry for a single scan.
 * Created by StaticLinter at scan start and dropped when the scan ends,
 * so no detector state leaks into the next scan.
 */
export class ResourceRegistryImpl implements IResourceRegistry {
  private resources = new Map<ResourceId, Resource>();

  getOrCreate<T extends Resource>(id: ResourceId, factory: () => T): T {
    let resource = this.resources.get(id);
    if (!resource) {
      resource = factory();
      if (resource.id !== id) {
        throw new Error(
          `Resource factory returned resource with id "${resource.id}" but expected "${id}"`
        );
      }
      this.resources.set(id, resource);
    }
    return resource as T;
  }

  get<T extends Resource>(id: ResourceId): T | undefined {
    return this.resources.get(id) as T | undefined;
  }

  has(id: ResourceId): boolean {
    return this.resources.has(id);
  }

  clear(): void {
    this.resources.clear();
  }
}
