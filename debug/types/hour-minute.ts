import { createCustomType, TypeMapper } from '../../src';

/**
 * HourMinute type for storing time as hours and minutes
 */
export interface HourMinute {
  hour: number;
  minute: number;
}

/**
 * Custom type mapper for HourMinute
 * Sent as an integer (minutes since midnight) on the wire
 * Converts to/from {hour, minute} object in application
 */
export const hourMinute: TypeMapper<HourMinute> = createCustomType<HourMinute, number>({
  dataType: () => 'Edm.Int16',

  isWireValue: (value): value is number => typeof value === 'number',

  toWire: (value: HourMinute | null | undefined) => {
    if (value == null) {
      return null;
    }

    return (value.hour * 60) + value.minute;
  },

  fromWire: (value: number | null | undefined) => {
    if (value == null) {
      return null;
    }

    const hour = Math.floor(value / 60);
    return {
      hour,
      minute: value % 60,
    };
  },
});
