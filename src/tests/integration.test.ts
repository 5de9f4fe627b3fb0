/**
 * INTEGRATION TESTS
 *
 * The storefront coordinators run against mocked effects. Pricing rules are
 * covered by the pure tests; here we check that the right data is fetched,
 * the right effects are called, and failures come back as the right Left.
 */

import {
  addSellerProduct,
  editSellerProduct,
  filterProductsByCategory,
  getDiscountDetail,
  getSellerProductForm,
  getSellersRoom,
  getStoreDetail,
  listCurrentDiscounts,
  removeSellerProduct,
} from '../pure/storefront';
import {
  createMockEffects,
  testCategories,
  testDiscount,
  testListings,
  testProducts,
  testStore,
  TODAY,
} from './mockEffects';

beforeEach(() => {
  jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  jest.spyOn(console, 'error').mockImplementation(() => undefined);
});

afterEach(() => {
  jest.restoreAllMocks();
});

describe('listCurrentDiscounts', () => {
  it('pages through the discounts that are current today', async () => {
    const discounts = ['a', 'b', 'c', 'd'].map(id => ({...testDiscount, id, slug: id}));
    const effects = createMockEffects({
      discounts: {
        getCurrent: jest.fn().mockResolvedValue([discounts[0], {...discounts[1], isActive: false}, discounts[2], discounts[3]]),
        getBySlug: jest.fn(),
        getByIds: jest.fn(),
      },
    });

    const result = await listCurrentDiscounts(2, TODAY)(effects);

    expect(effects.discounts.getCurrent).toHaveBeenCalledWith(TODAY);
    const page = result.unsafeCoerce();
    expect(page.items.map(d => d.id)).toEqual(['d']);
    expect(page.totalItems).toBe(3);
    expect(page.totalPages).toBe(2);
  });
});

describe('getDiscountDetail', () => {
  it('prices the listings the discount covers', async () => {
    const effects = createMockEffects();

    const result = await getDiscountDetail('spring-sale', TODAY)(effects);

    expect(effects.sellerProducts.getByDiscount).toHaveBeenCalledWith(testDiscount);
    const detail = result.unsafeCoerce();
    expect(detail.isCurrent).toBe(true);
    expect(detail.products.map(p => [p.product.id, p.effectivePrice])).toEqual([['31', 80], ['33', 10]]);
    expect(effects.monitoring.sendAlerts).not.toHaveBeenCalled();
  });

  it('shows base prices once the discount has expired', async () => {
    const effects = createMockEffects();

    const result = await getDiscountDetail('spring-sale', '2024-04-01')(effects);

    const detail = result.unsafeCoerce();
    expect(detail.isCurrent).toBe(false);
    expect(detail.products.map(p => p.effectivePrice)).toEqual([100, 12.5]);
  });

  it('returns Left when the discount does not exist', async () => {
    const effects = createMockEffects({
      discounts: {
        getCurrent: jest.fn(),
        getBySlug: jest.fn().mockResolvedValue(null),
        getByIds: jest.fn(),
      },
    });

    const result = await getDiscountDetail('missing', TODAY)(effects);

    expect(result.extract()).toEqual({kind: 'NotFound', message: 'Discount missing not found'});
    expect(effects.sellerProducts.getByDiscount).not.toHaveBeenCalled();
  });

  it('reports an invalid discount to monitoring', async () => {
    const broken = {...testDiscount, id: '45', value: 150};
    const effects = createMockEffects({
      discounts: {
        getCurrent: jest.fn(),
        getBySlug: jest.fn().mockResolvedValue(broken),
        getByIds: jest.fn(),
      },
    });

    const result = await getDiscountDetail('spring-sale', TODAY)(effects);

    expect(result.unsafeCoerce().products.map(p => p.effectivePrice)).toEqual([100, 12.5]);
    expect(effects.monitoring.sendAlerts).toHaveBeenCalledWith([{
      type: 'invalid_discount',
      discountId: '45',
      reason: 'Discount 45 exceeds 100 percent (150)',
    }]);
    expect(console.warn).toHaveBeenCalledWith('Discount 45 skipped: Discount 45 exceeds 100 percent (150)');
  });

  it('still answers when monitoring is down', async () => {
    const outage = new Error('CloudWatch unavailable');
    const effects = createMockEffects({
      discounts: {
        getCurrent: jest.fn(),
        getBySlug: jest.fn().mockResolvedValue({...testDiscount, value: 150}),
        getByIds: jest.fn(),
      },
      monitoring: {
        sendAlerts: jest.fn().mockRejectedValue(outage),
      },
    });

    const result = await getDiscountDetail('spring-sale', TODAY)(effects);

    expect(result.isRight()).toBe(true);
    expect(console.error).toHaveBeenCalledWith('Failed to report pricing integrity alerts:', outage);
  });
});

describe('getStoreDetail', () => {
  it('prices every listing with its own discount', async () => {
    const effects = createMockEffects();

    const result = await getStoreDetail('lamp-corner', TODAY)(effects);

    expect(effects.sellerProducts.getByStores).toHaveBeenCalledWith(['10']);
    expect(effects.discounts.getByIds).toHaveBeenCalledWith(['41']);
    const detail = result.unsafeCoerce();
    expect(detail.store).toEqual(testStore);
    expect(detail.products.map(p => [p.product.id, p.effectivePrice])).toEqual([
      ['31', 80],
      ['32', 40],
      ['33', 10],
    ]);
  });

  it('returns Left when the store does not exist', async () => {
    const effects = createMockEffects({
      stores: {
        getById: jest.fn(),
        getBySlug: jest.fn().mockResolvedValue(null),
        getByOwner: jest.fn(),
      },
    });

    const result = await getStoreDetail('nowhere', TODAY)(effects);

    expect(result.extract()).toEqual({kind: 'NotFound', message: 'Store nowhere not found'});
  });
});

describe('filterProductsByCategory', () => {
  it('returns id and name pairs', async () => {
    const effects = createMockEffects();

    const result = await filterProductsByCategory('5')(effects);

    expect(effects.catalog.getProducts).toHaveBeenCalledWith('5');
    expect(result.unsafeCoerce()).toEqual([{id: '21', name: 'Desk lamp'}, {id: '22', name: 'Floor lamp'}]);
  });
});

describe('seller room', () => {
  it('lists the seller\'s stores and listings', async () => {
    const effects = createMockEffects();

    const result = await getSellersRoom('1')(effects);

    expect(effects.authorization.hasPermission).toHaveBeenCalledWith('1', 'sellers');
    expect(effects.sellerProducts.getByStores).toHaveBeenCalledWith(['10']);
    expect(result.unsafeCoerce()).toEqual({stores: [testStore], categories: testCategories, sellerProducts: testListings});
  });

  it('turns away users who are not sellers', async () => {
    const effects = createMockEffects({
      authorization: {hasPermission: jest.fn().mockResolvedValue(false)},
    });

    const result = await getSellersRoom('2')(effects);

    expect(result.extract()).toEqual({kind: 'Forbidden', message: 'User 2 is not allowed to manage stores'});
    expect(effects.stores.getByOwner).not.toHaveBeenCalled();
  });

  it('loads everything the listing form needs', async () => {
    const effects = createMockEffects();

    const result = await getSellerProductForm('1', TODAY)(effects);

    expect(effects.discounts.getCurrent).toHaveBeenCalledWith(TODAY);
    expect(result.unsafeCoerce()).toEqual({
      categories: testCategories,
      products: testProducts,
      discounts: [testDiscount],
      stores: [testStore],
    });
  });

  it('offers only discounts that are current today', async () => {
    const effects = createMockEffects();
    const expired = {...testDiscount, id: '42', validTo: '2024-03-14'};
    effects.discounts.getCurrent = jest.fn().mockResolvedValue([testDiscount, expired, {...testDiscount, id: '43', isActive: false}]);

    const result = await getSellerProductForm('1', TODAY)(effects);

    expect(result.unsafeCoerce().discounts).toEqual([testDiscount]);
  });
});

describe('addSellerProduct', () => {
  const input = {storeId: '10', productId: '22', price: 40, quantity: 2, discountId: null};

  it('creates the listing', async () => {
    const effects = createMockEffects();

    const result = await addSellerProduct('1', input)(effects);

    expect(effects.sellerProducts.existsInStore).toHaveBeenCalledWith('10', '22');
    expect(effects.sellerProducts.create).toHaveBeenCalledWith(input);
    expect(result.unsafeCoerce().id).toBe('34');
  });

  it('refuses a product the store already sells', async () => {
    const effects = createMockEffects();
    effects.sellerProducts.existsInStore = jest.fn().mockResolvedValue(true);

    const result = await addSellerProduct('1', input)(effects);

    expect(result.extract()).toEqual({kind: 'Conflict', message: 'This product already exists in this store!'});
    expect(effects.sellerProducts.create).not.toHaveBeenCalled();
  });

  it('answers Conflict when a concurrent add inserted the product first', async () => {
    const effects = createMockEffects();
    effects.sellerProducts.create = jest.fn().mockResolvedValue(null);

    const result = await addSellerProduct('1', input)(effects);

    expect(result.extract()).toEqual({kind: 'Conflict', message: 'This product already exists in this store!'});
  });

  it('does not mistake an inherited property for a discount', async () => {
    const effects = createMockEffects();
    effects.discounts.getByIds = jest.fn().mockResolvedValue({});

    const result = await addSellerProduct('1', {...input, discountId: 'toString'})(effects);

    expect(result.extract()).toEqual({kind: 'Validation', message: 'Discount toString not found'});
    expect(effects.sellerProducts.create).not.toHaveBeenCalled();
  });

  it('refuses a store owned by someone else', async () => {
    const effects = createMockEffects();

    const result = await addSellerProduct('7', input)(effects);

    expect(result.extract()).toEqual({kind: 'Forbidden', message: 'Store 10 does not belong to user 7'});
  });

  it('refuses an unknown discount', async () => {
    const effects = createMockEffects();
    effects.discounts.getByIds = jest.fn().mockResolvedValue({});

    const result = await addSellerProduct('1', {...input, discountId: '49'})(effects);

    expect(effects.discounts.getByIds).toHaveBeenCalledWith(['49']);
    expect(result.extract()).toEqual({kind: 'Validation', message: 'Discount 49 not found'});
  });

  it('refuses an unknown product', async () => {
    const effects = createMockEffects();
    effects.catalog.getProductById = jest.fn().mockResolvedValue(null);

    const result = await addSellerProduct('1', {...input, productId: '29'})(effects);

    expect(result.extract()).toEqual({kind: 'NotFound', message: 'Product 29 not found'});
  });

  it('validates before touching storage', async () => {
    const effects = createMockEffects();

    const result = await addSellerProduct('1', {...input, price: -5})(effects);

    expect(result.extract()).toEqual({kind: 'Validation', message: 'Price must be a non-negative amount'});
    expect(effects.stores.getById).not.toHaveBeenCalled();
  });
});

describe('editSellerProduct', () => {
  const changes = {price: 90, quantity: 5, discountId: '41'};

  it('updates an owned listing', async () => {
    const effects = createMockEffects();

    const result = await editSellerProduct('1', '31', changes)(effects);

    expect(effects.sellerProducts.update).toHaveBeenCalledWith('31', changes);
    expect(result.unsafeCoerce().price).toBe(90);
  });

  it('returns Left for a missing listing', async () => {
    const effects = createMockEffects();
    effects.sellerProducts.getById = jest.fn().mockResolvedValue(null);

    const result = await editSellerProduct('1', '39', changes)(effects);

    expect(result.extract()).toEqual({kind: 'NotFound', message: 'Seller product 39 not found'});
    expect(effects.sellerProducts.update).not.toHaveBeenCalled();
  });
});

describe('removeSellerProduct', () => {
  it('removes an owned listing and returns it', async () => {
    const effects = createMockEffects();

    const result = await removeSellerProduct('1', '31')(effects);

    expect(effects.sellerProducts.remove).toHaveBeenCalledWith('31');
    expect(result.unsafeCoerce()).toEqual(testListings[0]);
  });

  it('leaves other sellers\' listings alone', async () => {
    const effects = createMockEffects();

    const result = await removeSellerProduct('7', '31')(effects);

    expect(result.extract()).toEqual({kind: 'Forbidden', message: 'Store 10 does not belong to user 7'});
    expect(effects.sellerProducts.remove).not.toHaveBeenCalled();
  });
});
