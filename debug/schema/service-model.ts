import {
  boolean,
  datetime,
  decimal,
  defineEntity,
  integer,
  navigation,
  navigationCollection,
  string,
  valueProperty,
} from "../../src";
import { ServiceBase } from "../model/service-base";
import { Product } from "../model/product";
import { Category } from "../model/category";
import { OrderLine } from "../model/orderLine";
import { ShippingNote } from "../model/shippingNote";
import { Supplier } from "../model/supplier";
import { hourMinute } from "../types/hour-minute";

// Shared by every entity of the sample service
defineEntity(ServiceBase, {
  properties: {
    id: integer('Id').primaryKey(),
    createdDate: datetime('Created'),
    modifiedDate: datetime('Modified'),
  },
});

defineEntity(Product, {
  type: 'ProductDataService.Objects.Product',
  collection: 'Products',
  properties: {
    name: string('ProductName'),
    quantityInStorage: integer('QuantityInStorage'),
    price: decimal('Price'),
    discontinued: boolean('Discontinued'),
    category: navigation('Category', () => Category),
    orderLines: navigationCollection('OrderLines', () => OrderLine),
  },
});

defineEntity(Category, {
  type: 'ProductDataService.Objects.Category',
  collection: 'Categories',
  properties: {
    name: string('CategoryName'),
    products: navigationCollection('Products', () => Product),
  },
});

defineEntity(OrderLine, {
  type: 'ProductDataService.Objects.OrderLine',
  collection: 'OrderLines',
  properties: {
    quantity: integer('Quantity'),
    product: navigation('Product', () => Product),
  },
});

defineEntity(ShippingNote, {
  type: 'ProductDataService.Objects.ShippingNote',
  collection: 'ShippingNotes',
  properties: {
    text: string('Text'),
    deliveryWindow: valueProperty('DeliveryWindow', hourMinute),
  },
});

defineEntity(Supplier, {
  type: 'ProductDataService.Objects.Supplier',
  collection: 'Suppliers',
  properties: {
    code: string('Code').primaryKey(),
    companyName: string('CompanyName'),
  },
});

export { ServiceBase, Product, Category, OrderLine, ShippingNote, Supplier };
