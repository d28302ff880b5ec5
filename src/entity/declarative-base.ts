import { EntityBase } from './entity-base';

/**
 * Create a fresh root class for a set of entities.
 *
 * Each root carries its own `urlBase` and `fetcher`, so entities of
 * different services never share them. Properties common to all entities of
 * the service can be declared on the root itself.
 *
 * @example
 * ```typescript
 * class MyBase extends declarativeBase() {
 *   declare id: number | null;
 * }
 * defineEntity(MyBase, { properties: { id: integer('Id').primaryKey() } });
 *
 * MyBase.urlBase = 'https://svc/';
 * ```
 */
export function declarativeBase(): typeof EntityBase {
  abstract class Entity extends EntityBase { }
  return Entity;
}
