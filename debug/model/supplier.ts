import { EntityBase } from "../../src";

/**
 * Entity keyed by a string code
 */
export class Supplier extends EntityBase {
  declare code: string | null;
  declare companyName: string | null;
}
