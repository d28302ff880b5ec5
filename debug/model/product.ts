import { ServiceBase } from "./service-base";
import type { Category } from "./category";
import type { OrderLine } from "./orderLine";

export class Product extends ServiceBase {
  declare name: string | null;
  declare quantityInStorage: number | null;
  declare price: string | null;
  declare discontinued: boolean | null;

  // Navigation properties
  declare category: Category | null | undefined;
  declare orderLines: OrderLine[] | undefined;

  isProductAvailable(): boolean {
    return (this.quantityInStorage ?? 0) > 0;
  }
}
