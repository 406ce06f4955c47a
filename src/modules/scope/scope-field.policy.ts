export const DEFAULT_SCOPE_FIELD = 'agency_id';

export const LEGACY_SCOPE_FIELD = 'studio_id';

// Task collections predate the agency rename and still carry studio_id.
export const LEGACY_SCOPE_COLLECTIONS: readonly string[] = ['tasks', 'task_history'];

export type ScopeFieldPolicy = (collectionName: string) => string;

export interface ScopeFieldPolicyOptions {
  defaultField?: string;
  overrides?: Record<string, string>;
}

/**
 * Builds the collection-to-scope-field lookup. Total: any collection without
 * an override resolves to the default field.
 */
export function createScopeFieldPolicy(options: ScopeFieldPolicyOptions = {}): ScopeFieldPolicy {
  const defaultField = options.defaultField ?? DEFAULT_SCOPE_FIELD;
  const overrides = new Map<string, string>(
    options.overrides
      ? Object.entries(options.overrides)
      : LEGACY_SCOPE_COLLECTIONS.map((name): [string, string] => [name, LEGACY_SCOPE_FIELD]),
  );
  return collectionName => overrides.get(collectionName) ?? defaultField;
}

export const resolveScopeField: ScopeFieldPolicy = createScopeFieldPolicy();
