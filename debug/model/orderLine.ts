import { ServiceBase } from "./service-base";
import type { Product } from "./product";

export class OrderLine extends ServiceBase {
  declare quantity: number | null;

  // Navigation property
  declare product: Product | null | undefined;
}
