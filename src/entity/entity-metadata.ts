import type { EntityBase } from './entity-base';
import type { AbstractEntityClass } from './types';
import { EntityProperty, ValueProperty, isValueProperty } from '../schema/property';
import {
  CollectionNavigation,
  NavigationProperty,
  SingleNavigation,
  isNavigationProperty,
} from '../schema/navigation';

/**
 * Descriptor table of an entity class, classified once at definition time
 */
export interface EntityMetadata {
  entityName: string;
  properties: ReadonlyArray<readonly [string, EntityProperty]>;
  valueProperties: ReadonlyArray<readonly [string, ValueProperty<unknown>]>;
  navigationProperties: ReadonlyArray<readonly [string, NavigationProperty]>;
  navigationsByName: ReadonlyMap<string, NavigationProperty>;
  primaryKey?: readonly [string, ValueProperty<unknown>];
}

/**
 * Property descriptor expected for an attribute of the given type:
 * an entity maps to a single navigation, a list of entities to a
 * collection navigation, anything else to a value property.
 */
export type PropertyFor<TValue> =
  NonNullable<TValue> extends ReadonlyArray<infer TElement>
    ? [TElement] extends [EntityBase]
      ? CollectionNavigation<TElement>
      : ValueProperty<NonNullable<TValue>>
    : NonNullable<TValue> extends EntityBase
    ? SingleNavigation<NonNullable<TValue>>
    : ValueProperty<NonNullable<TValue>>;

/**
 * Declared properties of an entity, keyed by attribute name
 */
export type PropertyTable<T> = {
  [K in Exclude<keyof T, keyof EntityBase>]?: PropertyFor<T[K]>;
};

/**
 * Entity definition passed to {@link defineEntity}
 */
export interface EntityDefinition<T> {
  /**
   * Schema type name, e.g. `ProductDataService.Objects.Product`
   */
  type?: string;

  /**
   * Collection (entity set) name, e.g. `Products`
   */
  collection?: string;

  properties: PropertyTable<T>;
}

/**
 * Global entity metadata store
 */
export class EntityMetadataStore {
  private static metadata = new Map<Function, EntityMetadata>();
  private static inherited = new Map<Function, EntityMetadata>();

  private static readonly empty: EntityMetadata = Object.freeze({
    entityName: 'Entity',
    properties: [],
    valueProperties: [],
    navigationProperties: [],
    navigationsByName: new Map<string, NavigationProperty>(),
  });

  /**
   * Metadata registered for exactly this class
   */
  static getOwnMetadata(entityClass: Function): EntityMetadata | undefined {
    return this.metadata.get(entityClass);
  }

  /**
   * Metadata of the nearest registered class in the class chain, named after
   * the given class. Computed once per class.
   */
  static resolve(entityClass: Function): EntityMetadata {
    const own = this.metadata.get(entityClass) ?? this.inherited.get(entityClass);
    if (own) return own;

    let resolved: EntityMetadata = { ...this.empty, entityName: entityClass.name };
    let current: unknown = Object.getPrototypeOf(entityClass);
    while (typeof current === 'function') {
      const metadata = this.metadata.get(current);
      if (metadata) {
        resolved = { ...metadata, entityName: entityClass.name };
        break;
      }
      current = Object.getPrototypeOf(current);
    }
    this.inherited.set(entityClass, resolved);
    return resolved;
  }

  /**
   * A registered class that extends the given one, if any
   */
  static findRegisteredSubclass(entityClass: Function): Function | undefined {
    for (const registered of this.metadata.keys()) {
      if (registered !== entityClass && Object.prototype.isPrototypeOf.call(entityClass, registered)) {
        return registered;
      }
    }
    return undefined;
  }

  static register(entityClass: Function, metadata: EntityMetadata): void {
    if (this.metadata.has(entityClass)) {
      throw new Error(`Entity ${entityClass.name} is already defined`);
    }
    this.metadata.set(entityClass, metadata);
    // Subclasses resolved earlier now inherit from this class
    this.inherited.clear();
  }
}

/**
 * Get the descriptor table that applies to an entity class
 */
export function getEntityMetadata(entityClass: Function): EntityMetadata {
  return EntityMetadataStore.resolve(entityClass);
}

/**
 * Declare the properties and protocol names of an entity class.
 *
 * Properties are appended to those inherited from the parent class, and an
 * accessor is installed on the class prototype for each of them, so
 * attributes should be declared with `declare` to keep instances free of
 * own fields.
 *
 * @example
 * ```typescript
 * class Product extends Entity {
 *   declare id: number | null;
 *   declare name: string | null;
 *   declare category: Category | null | undefined;
 * }
 *
 * defineEntity(Product, {
 *   type: 'ProductDataService.Objects.Product',
 *   collection: 'Products',
 *   properties: {
 *     id: integer('ProductID').primaryKey(),
 *     name: string('ProductName'),
 *     category: navigation('Category', () => Category),
 *   },
 * });
 * ```
 */
export function defineEntity<T extends EntityBase>(
  entityClass: AbstractEntityClass<T>,
  definition: EntityDefinition<T>
): void {
  if (EntityMetadataStore.getOwnMetadata(entityClass)) {
    throw new Error(`Entity ${entityClass.name} is already defined`);
  }
  const subclass = EntityMetadataStore.findRegisteredSubclass(entityClass);
  if (subclass) {
    throw new Error(`Entity ${entityClass.name} must be defined before its subclass ${subclass.name}`);
  }

  const parent = getEntityMetadata(Object.getPrototypeOf(entityClass));
  const properties: Array<readonly [string, EntityProperty]> = [...parent.properties];
  const ownProperties: Array<readonly [string, EntityProperty]> = [];
  const wireNames = new Set(parent.properties.map(([, property]) => property.name));

  for (const [attribute, property] of Object.entries(definition.properties)) {
    if (!(property instanceof EntityProperty)) continue;
    if (attribute in entityClass.prototype) {
      throw new Error(`Property '${attribute}' of ${entityClass.name} collides with an existing member`);
    }
    if (wireNames.has(property.name)) {
      throw new Error(`${entityClass.name} maps more than one property to the field '${property.name}'`);
    }
    wireNames.add(property.name);
    ownProperties.push([attribute, property]);
  }
  properties.push(...ownProperties);

  const valueProperties: Array<readonly [string, ValueProperty<unknown>]> = [];
  const navigationProperties: Array<readonly [string, NavigationProperty]> = [];
  const navigationsByName = new Map<string, NavigationProperty>();
  let primaryKey: readonly [string, ValueProperty<unknown>] | undefined;

  for (const [attribute, property] of properties) {
    if (isNavigationProperty(property)) {
      navigationProperties.push([attribute, property]);
      navigationsByName.set(property.name, property);
    } else if (isValueProperty(property)) {
      if (property.isPrimaryKey) {
        if (primaryKey) {
          throw new Error(
            `${entityClass.name} declares more than one primary key: '${primaryKey[0]}' and '${attribute}'`
          );
        }
        primaryKey = [attribute, property];
      }
      valueProperties.push([attribute, property]);
    }
  }

  for (const [attribute, property] of ownProperties) {
    property.defineAccessor(entityClass.prototype, attribute);
    property.markRegistered();
  }

  if (definition.type !== undefined) entityClass.typeName = definition.type;
  if (definition.collection !== undefined) entityClass.collectionName = definition.collection;

  EntityMetadataStore.register(entityClass, {
    entityName: entityClass.name,
    properties: Object.freeze(properties),
    valueProperties: Object.freeze(valueProperties),
    navigationProperties: Object.freeze(navigationProperties),
    navigationsByName,
    primaryKey,
  });
}
