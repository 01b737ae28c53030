/**
 * Run-scoped record of store-assigned ids, by resource type in extraction
 * order. Lives only for one pipeline invocation and is never persisted.
 */
export class IdentifierScratch {
  private readonly idsByType = new Map<string, string[]>();

  record(resourceType: string, id: string): void {
    if (!id) {
      throw new Error(`Refusing to record an empty ${resourceType} id`);
    }
    const ids = this.idsByType.get(resourceType);
    if (ids) {
      if (!ids.includes(id)) ids.push(id);
    } else {
      this.idsByType.set(resourceType, [id]);
    }
  }

  first(resourceType: string): string | undefined {
    return this.idsByType.get(resourceType)?.[0];
  }
}
