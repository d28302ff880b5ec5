/**
 * Custom type mapper for bidirectional data transformation
 */
export interface TypeMapper<TData = unknown> {
  /**
   * Convert from application data type to the value sent on the wire
   */
  toWire(value: TData | null | undefined): unknown;

  /**
   * Convert from a raw wire value to the application data type
   */
  fromWire(value: unknown): TData | null;

  /**
   * Optional: the protocol's type name (Edm.String, Edm.Int32, ...)
   */
  dataType?: () => string;
}

/**
 * Custom type definition with mapper
 */
export interface CustomTypeDefinition<TData, TWire> {
  dataType: () => string;
  toWire: (value: TData | null | undefined) => TWire | null;
  fromWire: (value: TWire | null | undefined) => TData | null;
  /**
   * Narrows a raw wire value before `fromWire` sees it. Values that fail the
   * check are treated as null.
   */
  isWireValue: (value: unknown) => value is TWire;
}

/**
 * Create a custom type mapper
 *
 * @example
 * ```typescript
 * const cents = createCustomType<number, string>({
 *   dataType: () => 'Edm.String',
 *   isWireValue: (v): v is string => typeof v === 'string',
 *   toWire: (v) => (v == null ? null : (v / 100).toFixed(2)),
 *   fromWire: (v) => (v == null ? null : Math.round(parseFloat(v) * 100)),
 * });
 * ```
 */
export function createCustomType<TData, TWire>(
  config: CustomTypeDefinition<TData, TWire>
): TypeMapper<TData> {
  return {
    dataType: config.dataType,
    toWire: config.toWire,
    fromWire: (value) => config.fromWire(config.isWireValue(value) ? value : null),
  };
}

/**
 * Identity mapper (no transformation)
 */
export function identityMapper<T>(isValue: (value: unknown) => value is T): TypeMapper<T> {
  return {
    toWire: (value) => value ?? null,
    fromWire: (value) => (isValue(value) ? value : null),
  };
}

/**
 * Apply a mapper to a value (toWire direction)
 */
export function applyToWire<TData>(mapper: TypeMapper<TData>, value: TData | null | undefined): unknown {
  if (value == null) return null;
  return mapper.toWire(value);
}

/**
 * Apply a mapper to a value (fromWire direction)
 */
export function applyFromWire<TData>(mapper: TypeMapper<TData>, value: unknown): TData | null {
  if (value == null) return null;
  return mapper.fromWire(value);
}
