import { declarativeBase } from "../../src";

/**
 * Root of the sample service - every entity shares the key and audit dates
 */
export abstract class ServiceBase extends declarativeBase() {
  declare id: number | null;
  declare createdDate: Date | null;
  declare modifiedDate: Date | null;

  didSomebodyTouchThis(): boolean {
    return this.createdDate?.getTime() !== this.modifiedDate?.getTime();
  }
}
