import { ENTITY_STATE, EntityState } from './entity-state';
import { getEntityMetadata } from './entity-metadata';
import type { RawEntityData, RelatedDataFetcher } from './types';
import { getEntityOptions } from '../config/entity-options';
import { urlJoin } from '../utils/url';

const inspectSymbol: unique symbol = Symbol.for('nodejs.util.inspect.custom');

/**
 * Base class for all entities.
 *
 * Instances keep no fields of their own: declared attributes are accessors
 * that route to the {@link EntityState} held under {@link ENTITY_STATE}.
 */
export abstract class EntityBase {
  /**
   * Schema type name of the entity
   */
  static typeName = 'ODataSchema.Entity';

  /**
   * Collection (entity set) the entity is addressed through
   */
  static collectionName = 'Entities';

  /**
   * Service root the collection is resolved against. May be set on a base
   * class at any time; subclasses see the change.
   */
  static urlBase = '';

  /**
   * Fetcher used to load navigations that were not embedded
   */
  static fetcher?: RelatedDataFetcher;

  /**
   * Address of the entity's collection
   */
  static url(): string {
    return urlJoin(this.urlBase, this.collectionName);
  }

  /** @internal */
  readonly [ENTITY_STATE]: EntityState<this>;

  constructor(rawData?: RawEntityData | null) {
    const metadata = getEntityMetadata(new.target);
    this[ENTITY_STATE] = new EntityState(this, new.target, metadata);

    if (rawData) {
      this.hydrate(rawData);
    }
  }

  /**
   * Entities are equal when both carry the same non-null primary key.
   * An instance always equals itself; distinct instances without a key
   * never do.
   */
  equals(other: unknown): boolean {
    if (other === this) return true;
    if (!(other instanceof EntityBase)) return false;

    const id = this[ENTITY_STATE].id;
    return id !== null && id === other[ENTITY_STATE].id;
  }

  /**
   * Debug representation: `Entity(Product:7)`, or `Entity(Product)` without a key
   */
  toString(): string {
    const className = this.constructor.name;
    const state = this[ENTITY_STATE];
    const primaryKey = state.primaryKeyProperty;
    const id = state.id;

    if (primaryKey && id !== null) {
      return `Entity(${className}:${primaryKey[1].escapeValue(id)})`;
    }
    return `Entity(${className})`;
  }

  [inspectSymbol](): string {
    return this.toString();
  }

  /**
   * Converts the value properties to a plain object keyed by attribute name
   */
  toJSON(): Record<string, unknown> {
    const state = this[ENTITY_STATE];
    const json: Record<string, unknown> = {};
    for (const [attribute, property] of state.valueProperties) {
      json[attribute] = property.read(state);
    }
    return json;
  }

  private hydrate(rawData: RawEntityData): void {
    const state = this[ENTITY_STATE];
    const data: RawEntityData = { ...rawData };
    let expanded = 0;

    // Embedded related entities are peeled off before the values are read
    for (const [, property] of state.navigationProperties) {
      if (Object.prototype.hasOwnProperty.call(data, property.name)) {
        const embedded = data[property.name];
        delete data[property.name];
        state.setNavigation(property.name, property.cacheEntryFromData(embedded));
        expanded++;
      }
    }

    for (const [, property] of state.valueProperties) {
      const value = data[property.name];
      state.initialize(property.name, value === undefined ? null : value);
    }

    const options = getEntityOptions();
    if (options.logHydration) {
      options.logger(
        `[odata] Hydrated ${String(this)} (${state.valueProperties.length} values, ${expanded} expanded navigations)`
      );
    }
  }
}
