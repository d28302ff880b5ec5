import type { EntityBase } from '../entity/entity-base';
import { stateOf, type EntityState } from '../entity/entity-state';
import { TypeMapper, applyFromWire, applyToWire } from '../types/type-mapper';

/**
 * Kind of a declared entity property
 */
export type PropertyKind = 'value' | 'navigation';

/**
 * Renders a wire value as a protocol literal
 */
export type ValueEscaper = (value: unknown) => string;

/**
 * Base class for every declared entity property.
 *
 * A property knows the field name it maps to on the wire, which may differ
 * from the attribute name the entity class exposes it under.
 */
export abstract class EntityProperty {
  abstract readonly kind: PropertyKind;

  /** @internal */
  protected primaryKeyFlag = false;

  private registered = false;

  constructor(
    /**
     * Field name on the wire
     */
    public readonly name: string
  ) { }

  /**
   * Whether this property identifies the entity
   */
  get isPrimaryKey(): boolean {
    return this.primaryKeyFlag;
  }

  /**
   * Whether the property belongs to a defined entity; its flags are then final
   */
  get isRegistered(): boolean {
    return this.registered;
  }

  /** @internal */
  markRegistered(): void {
    this.registered = true;
  }

  /**
   * Install the accessor that routes `attribute` on entity instances to the
   * entity state
   * @internal
   */
  abstract defineAccessor(prototype: object, attribute: string): void;
}

/**
 * A property mapping to a single scalar field.
 *
 * The entity state stores the raw wire value; the type mapper converts it
 * when the attribute is read or assigned.
 */
export class ValueProperty<TValue> extends EntityProperty {
  readonly kind = 'value' as const;

  constructor(
    name: string,
    /** @internal */
    public readonly mapper: TypeMapper<TValue>,
    private readonly escaper: ValueEscaper = String
  ) {
    super(name);
  }

  /**
   * Mark this property as the primary key
   */
  primaryKey(): this {
    if (this.isRegistered) {
      throw new Error(`Property '${this.name}' already belongs to a defined entity; mark the primary key before defineEntity`);
    }
    this.primaryKeyFlag = true;
    return this;
  }

  /**
   * Render a wire value as a protocol literal, e.g. for instance URLs or
   * debug output
   */
  escapeValue(value: unknown): string {
    return this.escaper(value);
  }

  /**
   * Read the application value from the entity state
   */
  read(state: EntityState): TValue | null {
    return applyFromWire(this.mapper, state.get(this.name));
  }

  /**
   * Write an application value to the entity state, marking the field dirty
   */
  write(state: EntityState, value: TValue | null | undefined): void {
    state.set(this.name, applyToWire(this.mapper, value));
  }

  /** @internal */
  defineAccessor(prototype: object, attribute: string): void {
    const property = this;
    Object.defineProperty(prototype, attribute, {
      get(this: EntityBase): TValue | null {
        return property.read(stateOf(this));
      },
      set(this: EntityBase, value: TValue | null | undefined) {
        property.write(stateOf(this), value);
      },
      enumerable: true,
      configurable: true,
    });
  }
}

/**
 * Create a value property from a custom type mapper
 *
 * @example
 * ```typescript
 * defineEntity(Room, {
 *   properties: {
 *     openingHours: valueProperty('OpeningHours', hourMinute, (v) => `'${v}'`),
 *   },
 * });
 * ```
 */
export function valueProperty<TValue>(
  name: string,
  mapper: TypeMapper<TValue>,
  escaper?: ValueEscaper
): ValueProperty<TValue> {
  return new ValueProperty(name, mapper, escaper);
}

/**
 * Type guard to check if a property is a value property
 */
export function isValueProperty(value: EntityProperty): value is ValueProperty<unknown> {
  return value.kind === 'value';
}
