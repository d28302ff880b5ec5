import { ValueProperty, ValueEscaper } from '../schema/property';
import { TypeMapper, createCustomType, identityMapper } from './type-mapper';

const isString = (value: unknown): value is string => typeof value === 'string';
const isNumber = (value: unknown): value is number => typeof value === 'number';
const isBoolean = (value: unknown): value is boolean => typeof value === 'boolean';
const isStringOrNumber = (value: unknown): value is string | number =>
  typeof value === 'string' || typeof value === 'number';

/**
 * Quote a string literal, doubling embedded single quotes
 */
export const escapeString: ValueEscaper = (value) => `'${String(value).replace(/'/g, "''")}'`;

/**
 * Edm.String
 */
export function string(name: string): ValueProperty<string> {
  return new ValueProperty(name, { ...identityMapper(isString), dataType: () => 'Edm.String' }, escapeString);
}

/**
 * Edm.Int32 and other integers within the safe number range; they may
 * arrive as numbers or numeric strings. Reading a value beyond that range
 * throws, map such fields with {@link int64}.
 */
export function integer(name: string): ValueProperty<number> {
  const mapper = createCustomType<number, string | number>({
    dataType: () => 'Edm.Int32',
    isWireValue: isStringOrNumber,
    toWire: (value) => (value == null ? null : Math.trunc(value)),
    fromWire: (value) => {
      if (value == null) return null;
      const parsed = typeof value === 'number' ? value : parseInt(value, 10);
      if (Number.isNaN(parsed)) return null;
      if (Math.abs(parsed) > Number.MAX_SAFE_INTEGER) {
        throw new Error(`Integer '${name}' holds ${String(value)}, beyond the safe number range; map it with int64()`);
      }
      return parsed;
    },
  });
  return new ValueProperty(name, mapper);
}

/**
 * Edm.Int64, kept as its decimal text so large keys survive a round trip
 */
export function int64(name: string): ValueProperty<string> {
  const mapper = createCustomType<string, string | number>({
    dataType: () => 'Edm.Int64',
    isWireValue: isStringOrNumber,
    toWire: (value) => value ?? null,
    fromWire: (value) => (value == null ? null : String(value)),
  });
  return new ValueProperty(name, mapper);
}

/**
 * Edm.Double
 */
export function float(name: string): ValueProperty<number> {
  const mapper = createCustomType<number, string | number>({
    dataType: () => 'Edm.Double',
    isWireValue: isStringOrNumber,
    toWire: (value) => value ?? null,
    fromWire: (value) => {
      if (value == null) return null;
      const parsed = typeof value === 'number' ? value : parseFloat(value);
      return Number.isNaN(parsed) ? null : parsed;
    },
  });
  return new ValueProperty(name, mapper);
}

/**
 * Edm.Decimal, kept as its decimal text to avoid losing precision
 */
export function decimal(name: string): ValueProperty<string> {
  const mapper = createCustomType<string, string | number>({
    dataType: () => 'Edm.Decimal',
    isWireValue: isStringOrNumber,
    toWire: (value) => value ?? null,
    fromWire: (value) => (value == null ? null : String(value)),
  });
  return new ValueProperty(name, mapper);
}

/**
 * Edm.Boolean
 */
export function boolean(name: string): ValueProperty<boolean> {
  return new ValueProperty(
    name,
    { ...identityMapper(isBoolean), dataType: () => 'Edm.Boolean' },
    (value) => (value ? 'true' : 'false')
  );
}

/**
 * Edm.DateTimeOffset, exchanged as ISO 8601 text
 */
export function datetime(name: string): ValueProperty<Date> {
  const mapper = createCustomType<Date, string>({
    dataType: () => 'Edm.DateTimeOffset',
    isWireValue: isString,
    toWire: (value) => (value == null ? null : value.toISOString()),
    fromWire: (value) => {
      if (value == null) return null;
      const date = new Date(value);
      return Number.isNaN(date.getTime()) ? null : date;
    },
  });
  return new ValueProperty(name, mapper);
}

/**
 * Edm.Date (`YYYY-MM-DD`), as a UTC midnight Date
 */
export function date(name: string): ValueProperty<Date> {
  const mapper = createCustomType<Date, string>({
    dataType: () => 'Edm.Date',
    isWireValue: isString,
    toWire: (value) => (value == null ? null : value.toISOString().slice(0, 10)),
    fromWire: (value) => {
      if (value == null) return null;
      const parsed = new Date(`${value.slice(0, 10)}T00:00:00Z`);
      return Number.isNaN(parsed.getTime()) ? null : parsed;
    },
  });
  return new ValueProperty(name, mapper);
}

/**
 * Edm.Guid
 */
export function guid(name: string): ValueProperty<string> {
  return new ValueProperty(name, { ...identityMapper(isString), dataType: () => 'Edm.Guid' });
}

/**
 * Untyped JSON value (complex types, open properties)
 */
export function json<T>(name: string, isValue: (value: unknown) => value is T): ValueProperty<T> {
  const mapper: TypeMapper<T> = identityMapper(isValue);
  return new ValueProperty(name, mapper, (value) => JSON.stringify(value));
}
