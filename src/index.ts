// Entities
export { EntityBase } from './entity/entity-base';
export { EntityState, ENTITY_STATE, stateOf } from './entity/entity-state';
export {
  EntityMetadataStore,
  defineEntity,
  getEntityMetadata,
} from './entity/entity-metadata';
export type { EntityDefinition, EntityMetadata, PropertyFor, PropertyTable } from './entity/entity-metadata';
export { declarativeBase } from './entity/declarative-base';
export { isRawEntityData } from './entity/types';
export type {
  AbstractEntityClass,
  EntityClass,
  EntityStatics,
  RawEntityData,
  RelatedDataFetcher,
} from './entity/types';

// Properties
export { EntityProperty, ValueProperty, valueProperty, isValueProperty } from './schema/property';
export type { PropertyKind, ValueEscaper } from './schema/property';
export {
  NavigationProperty,
  SingleNavigation,
  CollectionNavigation,
  navigation,
  navigationCollection,
  isNavigationProperty,
} from './schema/navigation';
export type { NavigationCacheEntry } from './schema/navigation';

// Types
export {
  string,
  integer,
  int64,
  float,
  decimal,
  boolean,
  datetime,
  date,
  guid,
  json,
  escapeString,
} from './types/property-types';
export { createCustomType, identityMapper, applyToWire, applyFromWire } from './types/type-mapper';
export type { TypeMapper, CustomTypeDefinition } from './types/type-mapper';

// Configuration
export {
  configureEntities,
  getEntityOptions,
  resetEntityOptions,
  entityOptionsFromEnv,
} from './config/entity-options';
export type { EntityOptions } from './config/entity-options';

// Utilities
export { urlJoin, isAbsoluteUrl } from './utils/url';
