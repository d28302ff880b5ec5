import { EntityBase } from "../../src";
import type { HourMinute } from "../types/hour-minute";

/**
 * Entity without a primary key - identity is the object itself
 */
export class ShippingNote extends EntityBase {
  declare text: string | null;
  declare deliveryWindow: HourMinute | null;
}
