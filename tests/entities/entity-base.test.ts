import { describe, test, expect } from '@jest/globals';
import { ENTITY_STATE, EntityBase, declarativeBase, defineEntity, integer, stateOf, string } from '../../src';
import { Category, OrderLine, Product, ServiceBase, ShippingNote, Supplier } from '../../debug/schema/service-model';

describe('Entity construction', () => {
  test('should initialize every value property to null without raw data', () => {
    const product = new Product();
    const state = stateOf(product);

    expect(product.id).toBeNull();
    expect(product.name).toBeNull();
    expect(product.quantityInStorage).toBeNull();
    expect(product.createdDate).toBeNull();

    expect([...state.values.keys()]).toEqual([
      'Id',
      'Created',
      'Modified',
      'ProductName',
      'QuantityInStorage',
      'Price',
      'Discontinued',
    ]);
    expect([...state.values.values()].every(value => value === null)).toBe(true);
    expect(state.dirtyFields.size).toBe(0);
    expect(state.isNavigationLoaded('Category')).toBe(false);
    expect(state.isNavigationLoaded('OrderLines')).toBe(false);
  });

  test('should treat null raw data like no raw data', () => {
    const product = new Product(null);

    expect(product.id).toBeNull();
    expect(stateOf(product).dirtyFields.size).toBe(0);
  });

  test('should create exactly one state per instance', () => {
    const first = new Product({ Id: 1 });
    const second = new Product({ Id: 1 });

    expect(stateOf(first)).toBeDefined();
    expect(stateOf(first)).toBe(first[ENTITY_STATE]);
    expect(stateOf(first)).not.toBe(stateOf(second));
    expect(stateOf(first).owner).toBe(first);
  });

  test('should keep no own fields on the instance', () => {
    const product = new Product({ Id: 1, ProductName: 'Kettle' });

    expect(Object.keys(product)).toEqual([]);
    expect(Object.getOwnPropertySymbols(product)).toEqual([ENTITY_STATE]);
  });
});

describe('Hydration from raw data', () => {
  test('should copy declared fields and ignore undeclared ones', () => {
    const product = new Product({
      Id: 7,
      ProductName: 'Kettle',
      QuantityInStorage: 12,
      Price: '19.90',
      Discontinued: false,
      Unknown: 'ignored',
    });
    const state = stateOf(product);

    expect(state.get('Id')).toBe(7);
    expect(state.get('ProductName')).toBe('Kettle');
    expect(state.get('QuantityInStorage')).toBe(12);
    expect(state.get('Price')).toBe('19.90');
    expect(state.get('Discontinued')).toBe(false);
    expect(state.values.has('Unknown')).toBe(false);

    expect(product.id).toBe(7);
    expect(product.name).toBe('Kettle');
    expect(product.price).toBe('19.90');
    expect(product.discontinued).toBe(false);
    expect(product.isProductAvailable()).toBe(true);
  });

  test('should default missing fields to null', () => {
    const product = new Product({ Id: 3 });
    const state = stateOf(product);

    expect(state.values.has('ProductName')).toBe(true);
    expect(state.get('ProductName')).toBeNull();
    expect(state.get('Created')).toBeNull();
  });

  test('should store undefined values as null', () => {
    const product = new Product({ Id: 3, ProductName: undefined });

    expect(stateOf(product).get('ProductName')).toBeNull();
  });

  test('should not mark any field dirty', () => {
    const product = new Product({ Id: 7, ProductName: 'Kettle', QuantityInStorage: 0 });

    expect(stateOf(product).dirtyFields.size).toBe(0);
    expect(stateOf(product).isDirty).toBe(false);
  });

  test('should convert wire values through the property type', () => {
    const product = new Product({ Id: 1, Created: '2024-03-01T10:00:00.000Z', Modified: '2024-03-02T10:00:00.000Z' });

    expect(product.createdDate).toEqual(new Date('2024-03-01T10:00:00.000Z'));
    expect(product.didSomebodyTouchThis()).toBe(true);
    expect(stateOf(product).get('Created')).toBe('2024-03-01T10:00:00.000Z');
  });

  test('should not mutate the raw mapping', () => {
    const raw = { Id: 1, Category: { Id: 2, CategoryName: 'Kitchen' } };

    new Product(raw);

    expect(raw).toEqual({ Id: 1, Category: { Id: 2, CategoryName: 'Kitchen' } });
  });

  test('should populate the navigation cache from an embedded single entity', () => {
    const product = new Product({
      Id: 7,
      ProductName: 'Kettle',
      Category: { Id: 2, CategoryName: 'Kitchen' },
    });
    const state = stateOf(product);
    const entry = state.getNavigation('Category');

    expect(entry?.cardinality).toBe('single');
    expect(product.category).toBeInstanceOf(Category);
    expect(product.category?.id).toBe(2);
    expect(product.category?.name).toBe('Kitchen');
    expect(state.values.has('Category')).toBe(false);
    expect(state.isNavigationLoaded('OrderLines')).toBe(false);
  });

  test('should cache an embedded null single entity as resolved', () => {
    const product = new Product({ Id: 7, Category: null });
    const state = stateOf(product);

    expect(state.getNavigation('Category')).toEqual({ cardinality: 'single', entity: null });
    expect(product.category).toBeNull();
  });

  test('should populate the navigation cache from an embedded collection, preserving order', () => {
    const category = new Category({
      Id: 2,
      CategoryName: 'Kitchen',
      Products: [
        { Id: 10, ProductName: 'Kettle' },
        { Id: 11, ProductName: 'Toaster' },
        { Id: 12, ProductName: 'Blender' },
      ],
    });
    const entry = stateOf(category).getNavigation('Products');

    expect(entry?.cardinality).toBe('collection');
    expect(category.products?.map(p => p.name)).toEqual(['Kettle', 'Toaster', 'Blender']);
    expect(category.products?.every(p => p instanceof Product)).toBe(true);
    expect(stateOf(category).values.has('Products')).toBe(false);
  });

  test('should cache an empty embedded collection', () => {
    const category = new Category({ Id: 2, Products: [] });

    expect(stateOf(category).isNavigationLoaded('Products')).toBe(true);
    expect(category.products).toEqual([]);
  });

  test('should hydrate nested expansions recursively', () => {
    const line = new OrderLine({
      Id: 100,
      Quantity: 3,
      Product: {
        Id: 7,
        ProductName: 'Kettle',
        Category: { Id: 2, CategoryName: 'Kitchen' },
      },
    });

    expect(line.product?.name).toBe('Kettle');
    expect(line.product?.category?.name).toBe('Kitchen');
    expect(stateOf(line).dirtyFields.size).toBe(0);
    expect(line.product && stateOf(line.product).dirtyFields.size).toBe(0);
  });

  test('should reject a collection payload that is not a list', () => {
    expect(() => new Category({ Id: 2, Products: { Id: 10 } })).toThrow(
      "Collection navigation 'Products' expected an array of Product, got object"
    );
  });

  test('should reject a single payload that is not an object', () => {
    expect(() => new Product({ Id: 7, Category: [{ Id: 2 }] })).toThrow(
      "Navigation property 'Category' expected an object for Category, got an array"
    );
  });

  test('should hydrate custom types', () => {
    const note = new ShippingNote({ Text: 'Leave at door', DeliveryWindow: 570 });

    expect(note.deliveryWindow).toEqual({ hour: 9, minute: 30 });
  });
});

describe('Equality', () => {
  test('should compare equal when primary keys match', () => {
    const first = new Product({ Id: 5, ProductName: 'Kettle' });
    const second = new Product({ Id: 5, ProductName: 'Toaster', QuantityInStorage: 3 });

    expect(first.equals(second)).toBe(true);
    expect(second.equals(first)).toBe(true);
  });

  test('should compare not equal when primary keys differ', () => {
    const first = new Product({ Id: 5 });
    const second = new Product({ Id: 6 });

    expect(first.equals(second)).toBe(false);
  });

  test('should never equal another instance without a key', () => {
    const first = new Product({ ProductName: 'Kettle' });
    const second = new Product({ ProductName: 'Kettle' });

    expect(first.equals(second)).toBe(false);
    expect(second.equals(first)).toBe(false);
    expect(new Product().equals(new Product())).toBe(false);
  });

  test('should equal itself even without a key', () => {
    const product = new Product();

    expect(product.equals(product)).toBe(true);
  });

  test('should not equal an instance whose key is null', () => {
    expect(new Product({ Id: 5 }).equals(new Product())).toBe(false);
  });

  test('should not equal values that are not entities', () => {
    const product = new Product({ Id: 5 });

    expect(product.equals(5)).toBe(false);
    expect(product.equals({ Id: 5 })).toBe(false);
    expect(product.equals(null)).toBe(false);
    expect(product.equals(undefined)).toBe(false);
  });

  test('should fall back to identity for entities without a declared key', () => {
    const note = new ShippingNote({ Text: 'a' });

    expect(note.equals(note)).toBe(true);
    expect(note.equals(new ShippingNote({ Text: 'a' }))).toBe(false);
  });

  test('should follow key changes made after construction', () => {
    const first = new Product();
    const second = new Product({ Id: 9 });

    first.id = 9;

    expect(first.equals(second)).toBe(true);
  });
});

describe('Debug representation', () => {
  test('should include the escaped primary key', () => {
    expect(new Product({ Id: 7 }).toString()).toBe('Entity(Product:7)');
  });

  test('should omit the key segment without a key value', () => {
    expect(new Product().toString()).toBe('Entity(Product)');
  });

  test('should omit the key segment without a declared key', () => {
    expect(new ShippingNote({ Text: 'a' }).toString()).toBe('Entity(ShippingNote)');
  });

  test('should escape string keys', () => {
    expect(new Supplier({ Code: "O'Brien" }).toString()).toBe("Entity(Supplier:'O''Brien')");
  });

  test('should render a zero key', () => {
    expect(new Product({ Id: 0 }).toString()).toBe('Entity(Product:0)');
  });

  test('should be used when interpolated', () => {
    expect(`${new Category({ Id: 2 })}`).toBe('Entity(Category:2)');
  });
});

describe('toJSON', () => {
  test('should return value properties keyed by attribute name', () => {
    const product = new Product({
      Id: 7,
      ProductName: 'Kettle',
      Created: '2024-03-01T10:00:00.000Z',
      Category: { Id: 2 },
    });

    expect(product.toJSON()).toEqual({
      id: 7,
      createdDate: new Date('2024-03-01T10:00:00.000Z'),
      modifiedDate: null,
      name: 'Kettle',
      quantityInStorage: null,
      price: null,
      discontinued: null,
    });
  });
});

describe('Collection URL', () => {
  test('should join the base and collection name', () => {
    class Base extends declarativeBase() { }
    class Widget extends Base { }
    defineEntity(Widget, { collection: 'Products', properties: {} });

    Base.urlBase = 'https://svc/';

    expect(Widget.url()).toBe('https://svc/Products');
  });

  test('should let an absolute collection name override the base', () => {
    class Base extends declarativeBase() { }
    class Widget extends Base { }
    defineEntity(Widget, { collection: 'https://other.example/Widgets', properties: {} });

    Base.urlBase = 'https://svc/';

    expect(Widget.url()).toBe('https://other.example/Widgets');
  });

  test('should see a base set after the class was defined', () => {
    class Base extends declarativeBase() { }
    class Widget extends Base { }
    defineEntity(Widget, { collection: 'Widgets', properties: {} });

    expect(Widget.url()).toBe('Widgets');

    Base.urlBase = 'https://svc/odata/';
    expect(Widget.url()).toBe('https://svc/odata/Widgets');

    Base.urlBase = 'https://mirror/odata/';
    expect(Widget.url()).toBe('https://mirror/odata/Widgets');
  });

  test('should default to the Entities collection', () => {
    class Base extends declarativeBase() { }
    class Gadget extends Base { }

    expect(Gadget.url()).toBe('Entities');
    expect(Gadget.typeName).toBe('ODataSchema.Entity');
  });

  test('should keep separate bases independent', () => {
    const first = declarativeBase();
    const second = declarativeBase();

    first.urlBase = 'https://first/';

    expect(second.urlBase).toBe('');
    expect(EntityBase.urlBase).toBe('');
  });

  test('should set the type and collection names from the definition', () => {
    expect(Product.typeName).toBe('ProductDataService.Objects.Product');
    expect(Product.collectionName).toBe('Products');
    expect(ServiceBase.collectionName).toBe('Entities');
  });
});

describe('Entities defined ad hoc', () => {
  test('should construct an entity with its own key', () => {
    class Tag extends EntityBase {
      declare code: number | null;
      declare label: string | null;
    }
    defineEntity(Tag, {
      properties: {
        code: integer('Code').primaryKey(),
        label: string('Label'),
      },
    });

    const tag = new Tag({ Code: 4, Label: 'sale' });

    expect(tag.label).toBe('sale');
    expect(tag.toString()).toBe('Entity(Tag:4)');
  });
});
