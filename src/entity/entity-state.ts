import type { EntityBase } from './entity-base';
import type { EntityMetadata } from './entity-metadata';
import type { EntityStatics, RelatedDataFetcher } from './types';
import type { ValueProperty } from '../schema/property';
import type { NavigationCacheEntry, NavigationProperty } from '../schema/navigation';
import { getEntityOptions } from '../config/entity-options';

/**
 * Key under which every entity instance holds its state
 */
export const ENTITY_STATE = Symbol('odata:entity-state');

/**
 * Get the state companion of an entity
 */
export function stateOf<TEntity extends EntityBase>(entity: TEntity): EntityState<TEntity> {
  return entity[ENTITY_STATE];
}

/**
 * Per-instance storage and change tracking for an entity.
 *
 * Field values are kept by wire name, in wire form. Writes through
 * {@link set} mark the field dirty; writes through {@link initialize} set
 * the baseline and leave it clean. Related entities are cached per
 * navigation wire name once resolved.
 */
export class EntityState<TEntity extends EntityBase = EntityBase> {
  /**
   * Fetcher for this instance only; falls back to the class's `fetcher`
   */
  fetcher?: RelatedDataFetcher;

  private readonly ownerRef: WeakRef<TEntity>;
  private readonly fieldValues = new Map<string, unknown>();
  private readonly dirty = new Set<string>();
  private readonly dirtyNavigationNames = new Set<string>();
  private readonly navCache = new Map<string, NavigationCacheEntry>();
  private readonly pendingLoads = new Map<string, Promise<NavigationCacheEntry>>();

  constructor(
    owner: TEntity,
    /** @internal */
    public readonly entityClass: EntityStatics,
    /** @internal */
    public readonly metadata: EntityMetadata
  ) {
    this.ownerRef = new WeakRef(owner);
    for (const [, property] of metadata.valueProperties) {
      this.fieldValues.set(property.name, null);
    }
  }

  /**
   * The entity this state belongs to, unless it has been released
   */
  get owner(): TEntity | undefined {
    return this.ownerRef.deref();
  }

  // ==========================================================================
  // Values
  // ==========================================================================

  /**
   * Current wire values keyed by wire name
   */
  get values(): ReadonlyMap<string, unknown> {
    return this.fieldValues;
  }

  /**
   * Read a wire value
   */
  get(name: string): unknown {
    this.assertValueName(name);
    return this.fieldValues.get(name);
  }

  /**
   * Write a wire value as a local edit, marking the field dirty
   */
  set(name: string, value: unknown): void {
    this.assertValueName(name);
    this.fieldValues.set(name, value);
    this.dirty.add(name);
  }

  /**
   * Write a wire value as the last known service value, leaving the field clean
   */
  initialize(name: string, value: unknown): void {
    this.assertValueName(name);
    this.fieldValues.set(name, value);
    this.dirty.delete(name);
  }

  // ==========================================================================
  // Introspection
  // ==========================================================================

  /**
   * Declared value properties as [attribute, descriptor] pairs, in declaration order
   */
  get valueProperties(): ReadonlyArray<readonly [string, ValueProperty<unknown>]> {
    return this.metadata.valueProperties;
  }

  /**
   * Declared navigation properties as [attribute, descriptor] pairs, in declaration order
   */
  get navigationProperties(): ReadonlyArray<readonly [string, NavigationProperty]> {
    return this.metadata.navigationProperties;
  }

  /**
   * The primary-key property, or undefined when none is declared
   */
  get primaryKeyProperty(): readonly [string, ValueProperty<unknown>] | undefined {
    return this.metadata.primaryKey;
  }

  /**
   * Primary-key wire value, or null
   */
  get id(): unknown {
    const primaryKey = this.metadata.primaryKey;
    if (!primaryKey) return null;
    return this.fieldValues.get(primaryKey[1].name) ?? null;
  }

  /**
   * Address of this instance on the service, e.g. `https://svc/Products(7)`,
   * or null when the primary key is not known
   */
  get instanceUrl(): string | null {
    const primaryKey = this.metadata.primaryKey;
    const id = this.id;
    if (!primaryKey || id === null) return null;
    return `${this.entityClass.url()}(${primaryKey[1].escapeValue(id)})`;
  }

  // ==========================================================================
  // Change tracking
  // ==========================================================================

  /**
   * Wire names of fields written since the last baseline
   */
  get dirtyFields(): ReadonlySet<string> {
    return this.dirty;
  }

  /**
   * Wire names of navigations assigned since the last baseline
   */
  get dirtyNavigations(): ReadonlySet<string> {
    return this.dirtyNavigationNames;
  }

  /**
   * Whether anything was changed locally
   */
  get isDirty(): boolean {
    return this.dirty.size > 0 || this.dirtyNavigationNames.size > 0;
  }

  /**
   * Wire values of the dirty fields, in declaration order
   */
  changedValues(): Record<string, unknown> {
    const changes: Record<string, unknown> = {};
    for (const [, property] of this.metadata.valueProperties) {
      if (this.dirty.has(property.name)) {
        changes[property.name] = this.fieldValues.get(property.name);
      }
    }
    return changes;
  }

  /**
   * Make the current values the new baseline, e.g. after a successful save
   */
  markClean(): void {
    this.dirty.clear();
    this.dirtyNavigationNames.clear();
  }

  // ==========================================================================
  // Navigation cache
  // ==========================================================================

  /**
   * Cached navigation data, or undefined when not resolved yet
   */
  getNavigation(name: string): NavigationCacheEntry | undefined {
    this.navigationProperty(name);
    return this.navCache.get(name);
  }

  /**
   * Whether a navigation has been resolved (possibly to nothing)
   */
  isNavigationLoaded(name: string): boolean {
    return this.getNavigation(name) !== undefined;
  }

  /**
   * Store resolved navigation data as service state
   */
  setNavigation(name: string, entry: NavigationCacheEntry): void {
    const property = this.navigationProperty(name);
    const expected = property.isCollection ? 'collection' : 'single';
    if (entry.cardinality !== expected) {
      throw new Error(
        `Navigation property '${name}' of ${this.metadata.entityName} holds ${expected} data, got ${entry.cardinality}`
      );
    }
    this.navCache.set(name, entry);
    this.pendingLoads.delete(name);
  }

  /**
   * Store navigation data as a local edit, marking the navigation dirty
   */
  assignNavigation(name: string, entry: NavigationCacheEntry): void {
    this.setNavigation(name, entry);
    this.dirtyNavigationNames.add(name);
  }

  /**
   * Resolve a navigation, fetching it at most once while cached or pending
   */
  async loadNavigation(name: string): Promise<NavigationCacheEntry> {
    const property = this.navigationProperty(name);

    const cached = this.navCache.get(name);
    if (cached) return cached;

    const existing = this.pendingLoads.get(name);
    if (existing) return existing;

    const owner = this.owner;
    if (!owner) {
      throw new Error(`Cannot load '${name}': the ${this.metadata.entityName} instance has been released`);
    }

    const fetcher = this.fetcher ?? this.entityClass.fetcher;
    if (!fetcher) {
      throw new Error(
        `Navigation property '${name}' of ${this.metadata.entityName} is not loaded and no fetcher is available`
      );
    }

    const pending = this.fetchNavigation(owner, fetcher, property);
    this.pendingLoads.set(name, pending);
    try {
      const entry = await pending;
      // A load invalidated while in flight is not cached
      if (this.pendingLoads.get(name) === pending) {
        this.navCache.set(name, entry);
      }
      return entry;
    } finally {
      if (this.pendingLoads.get(name) === pending) {
        this.pendingLoads.delete(name);
      }
    }
  }

  /**
   * Forget one resolved navigation, or all of them, so the next load fetches again
   */
  invalidateNavigation(name?: string): void {
    if (name === undefined) {
      this.navCache.clear();
      this.pendingLoads.clear();
      return;
    }
    this.navigationProperty(name);
    this.navCache.delete(name);
    this.pendingLoads.delete(name);
  }

  private async fetchNavigation(
    owner: TEntity,
    fetcher: RelatedDataFetcher,
    property: NavigationProperty
  ): Promise<NavigationCacheEntry> {
    const options = getEntityOptions();
    if (options.logNavigationLoads) {
      options.logger(`[odata] Loading ${this.metadata.entityName}.${property.name} for ${String(owner)}`);
    }

    const raw = await fetcher.fetchRelated(owner, property);
    return property.cacheEntryFromData(raw);
  }

  private assertValueName(name: string): void {
    if (!this.fieldValues.has(name)) {
      throw new Error(`${this.metadata.entityName} has no value property mapped to '${name}'`);
    }
  }

  private navigationProperty(name: string): NavigationProperty {
    const property = this.metadata.navigationsByName.get(name);
    if (!property) {
      throw new Error(`${this.metadata.entityName} has no navigation property mapped to '${name}'`);
    }
    return property;
  }
}
