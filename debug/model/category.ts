import { ServiceBase } from "./service-base";
import type { Product } from "./product";

export class Category extends ServiceBase {
  declare name: string | null;

  // Navigation property
  declare products: Product[] | undefined;
}
