/**
 * Resolves the owning tenant of persisted records by id, for guards that
 * receive identifiers instead of loaded entities.
 */
export interface EntityOwnershipLookup {
  /**
   * Returns the owner of each id that exists; unknown ids are absent from
   * the map. Throws TenantGuardConfigurationError for an unknown resource type.
   */
  findOwners(resourceType: string, ids: readonly string[]): Promise<Map<string, string>>;
}

/**
 * Map-backed lookup, keyed by resource type then id
 */
export class InMemoryEntityOwnershipLookup implements EntityOwnershipLookup {
  private readonly owners = new Map<string, Map<string, string>>();

  register(resourceType: string, id: string, ownerTenantId: string): this {
    let byId = this.owners.get(resourceType);
    if (!byId) {
      byId = new Map();
      this.owners.set(resourceType, byId);
    }
    byId.set(id.toLowerCase(), ownerTenantId.toLowerCase());
    return this;
  }

  async findOwners(resourceType: string, ids: readonly string[]): Promise<Map<string, string>> {
    const byId = this.owners.get(resourceType);
    const found = new Map<string, string>();
    if (!byId) {
      return found;
    }
    for (const id of ids) {
      const owner = byId.get(id.toLowerCase());
      if (owner !== undefined) {
        found.set(id.toLowerCase(), owner);
      }
    }
    return found;
  }
}
