/**
 * TESTS FOR THE DISCOUNT PRICING RESOLVER
 *
 * Pure functions only: listings and discounts go in, prices come out.
 */

import {ProductDiscount, SellerProduct} from '../domain';
import {
  computeDiscountedPrice,
  discountAppliesTo,
  isDiscountCurrent,
  priceForDisplay,
  priceListings,
  resolvePrices,
  toIntegrityAlert,
  validateDiscount,
} from '../pure/pricing';

const discount = (overrides: Partial<ProductDiscount> = {}): ProductDiscount => ({
  id: 'd-20',
  slug: 'spring-sale',
  title: 'Spring sale',
  description: 'Twenty percent off',
  kind: 'percentage',
  value: 20,
  validFrom: '2024-03-01',
  validTo: '2024-03-31',
  isActive: true,
  storeWide: false,
  storeId: null,
  ...overrides,
});

const listing = (overrides: Partial<SellerProduct> = {}): SellerProduct => ({
  id: 'sp-1',
  productId: 'p-1',
  productName: 'Desk lamp',
  storeId: 's-1',
  price: 100,
  quantity: 5,
  discountId: 'd-20',
  ...overrides,
});

describe('resolvePrices', () => {
  it('applies a percentage discount', () => {
    const result = resolvePrices([listing({price: 100})], discount({value: 20}));

    expect(result.isRight()).toBe(true);
    const [priced] = result.unsafeCoerce();
    expect(priced.originalPrice).toBe(100);
    expect(priced.effectivePrice).toBe(80);
    expect(priced.discount?.id).toBe('d-20');
  });

  it('clamps a fixed discount larger than the price at zero', () => {
    const result = resolvePrices(
      [listing({price: 50})],
      discount({id: 'd-60', kind: 'fixed_amount', value: 60})
    );

    expect(result.unsafeCoerce()[0].effectivePrice).toBe(0);
  });

  it('keeps base prices when there is no discount', () => {
    const result = resolvePrices([listing({price: 30, discountId: null})], null);

    expect(result.unsafeCoerce()).toEqual([
      {product: listing({price: 30, discountId: null}), originalPrice: 30, effectivePrice: 30, discount: null},
    ]);
  });

  it('rejects a percentage above 100', () => {
    const result = resolvePrices([listing()], discount({id: 'd-150', value: 150}));

    expect(result.isLeft()).toBe(true);
    expect(result.extract()).toEqual({
      kind: 'InvalidDiscount',
      discountId: 'd-150',
      message: 'Discount d-150 exceeds 100 percent (150)',
    });
  });

  it('rejects a negative base price', () => {
    const result = resolvePrices(
      [listing({id: 'sp-1'}), listing({id: 'sp-2', price: -1})],
      discount()
    );

    expect(result.extract()).toEqual({
      kind: 'InvalidPrice',
      sellerProductId: 'sp-2',
      message: 'Seller product sp-2 has a negative base price (-1)',
    });
  });

  it('returns one entry per product in input order', () => {
    const products = [
      listing({id: 'sp-3', price: 10}),
      listing({id: 'sp-1', price: 20}),
      listing({id: 'sp-2', price: 30}),
    ];

    const priced = resolvePrices(products, discount()).unsafeCoerce();

    expect(priced.map(p => p.product.id)).toEqual(['sp-3', 'sp-1', 'sp-2']);
    expect(priced.map(p => p.effectivePrice)).toEqual([8, 16, 24]);
  });

  it('leaves products the discount does not cover at their base price', () => {
    const priced = resolvePrices(
      [listing({id: 'sp-1'}), listing({id: 'sp-2', price: 40, discountId: 'd-other'})],
      discount()
    ).unsafeCoerce();

    expect(priced[1]).toEqual({
      product: listing({id: 'sp-2', price: 40, discountId: 'd-other'}),
      originalPrice: 40,
      effectivePrice: 40,
      discount: null,
    });
  });

  it('never raises a price and never goes below zero', () => {
    const discounts = [
      discount({value: 0}),
      discount({value: 35}),
      discount({value: 100}),
      discount({kind: 'fixed_amount', value: 0.01}),
      discount({kind: 'fixed_amount', value: 500}),
    ];
    const prices = [0, 0.01, 9.99, 100, 1234.56];

    discounts.forEach(d => {
      const priced = resolvePrices(prices.map((price, i) => listing({id: `sp-${i}`, price})), d).unsafeCoerce();
      priced.forEach(p => {
        expect(p.effectivePrice).toBeGreaterThanOrEqual(0);
        expect(p.effectivePrice).toBeLessThanOrEqual(p.originalPrice);
      });
    });
  });

  it('gives the same result for the same inputs and leaves them untouched', () => {
    const products = [listing({id: 'sp-1', price: 19.99}), listing({id: 'sp-2', price: 5, discountId: null})];
    const fifteenOff = discount({value: 15});
    const productsBefore = products.map(product => ({...product}));
    const discountBefore = {...fifteenOff};

    const first = resolvePrices(products, fifteenOff);
    const second = resolvePrices(products, fifteenOff);

    expect(second.unsafeCoerce()).toEqual(first.unsafeCoerce());
    expect(first.unsafeCoerce().map(p => p.effectivePrice)).toEqual([16.99, 5]);
    expect(products).toEqual(productsBefore);
    expect(products).toHaveLength(2);
    expect(fifteenOff).toEqual(discountBefore);
  });

  it('handles an empty product list', () => {
    expect(resolvePrices([], discount()).unsafeCoerce()).toEqual([]);
  });
});

describe('computeDiscountedPrice', () => {
  it('rounds to the nearest cent', () => {
    expect(computeDiscountedPrice(19.99, discount({value: 15}))).toBe(16.99);
    expect(computeDiscountedPrice(9.99, discount({value: 12.5}))).toBe(8.74);
  });

  it('subtracts a fixed amount', () => {
    expect(computeDiscountedPrice(20, discount({kind: 'fixed_amount', value: 5.5}))).toBe(14.5);
  });

  it('gives the item away at 100 percent', () => {
    expect(computeDiscountedPrice(42.5, discount({value: 100}))).toBe(0);
  });

  it('changes nothing at 0 percent', () => {
    expect(computeDiscountedPrice(42.5, discount({value: 0}))).toBe(42.5);
  });
});

describe('validateDiscount', () => {
  it('accepts a fixed amount above 100', () => {
    const fixed = discount({kind: 'fixed_amount', value: 250});
    expect(validateDiscount(fixed).extract()).toEqual(fixed);
  });

  it('rejects a negative magnitude', () => {
    expect(validateDiscount(discount({id: 'd-neg', kind: 'fixed_amount', value: -5})).extract()).toEqual({
      kind: 'InvalidDiscount',
      discountId: 'd-neg',
      message: 'Discount d-neg has a negative magnitude (-5)',
    });
  });
});

describe('isDiscountCurrent', () => {
  const march = discount({validFrom: '2024-03-01', validTo: '2024-03-31'});

  it('includes both ends of the window', () => {
    expect(isDiscountCurrent(march, '2024-03-01')).toBe(true);
    expect(isDiscountCurrent(march, '2024-03-31')).toBe(true);
  });

  it('excludes days outside the window', () => {
    expect(isDiscountCurrent(march, '2024-02-29')).toBe(false);
    expect(isDiscountCurrent(march, '2024-04-01')).toBe(false);
  });

  it('excludes inactive discounts', () => {
    expect(isDiscountCurrent(discount({isActive: false}), '2024-03-15')).toBe(false);
  });
});

describe('discountAppliesTo', () => {
  it('matches listings attached to the discount', () => {
    expect(discountAppliesTo(discount(), listing({discountId: 'd-20'}))).toBe(true);
    expect(discountAppliesTo(discount(), listing({discountId: null}))).toBe(false);
  });

  it('covers every listing of its store when store-wide', () => {
    const storeWide = discount({storeWide: true, storeId: 's-1'});

    expect(discountAppliesTo(storeWide, listing({storeId: 's-1', discountId: null}))).toBe(true);
    expect(discountAppliesTo(storeWide, listing({storeId: 's-2', discountId: null}))).toBe(false);
  });

  it('covers every store when store-wide without a store', () => {
    const everywhere = discount({storeWide: true, storeId: null});

    expect(discountAppliesTo(everywhere, listing({storeId: 's-9', discountId: null}))).toBe(true);
  });
});

describe('priceForDisplay', () => {
  it('drops an invalid discount and reports it', () => {
    const {items, alerts} = priceForDisplay([listing({price: 100})], discount({id: 'd-150', value: 150}));

    expect(items.map(i => i.effectivePrice)).toEqual([100]);
    expect(items[0].discount).toBeNull();
    expect(alerts).toEqual([{
      type: 'invalid_discount',
      discountId: 'd-150',
      reason: 'Discount d-150 exceeds 100 percent (150)',
    }]);
  });

  it('hides listings with an invalid price and reports them', () => {
    const {items, alerts} = priceForDisplay(
      [listing({id: 'sp-1', price: 100}), listing({id: 'sp-2', price: -3})],
      discount()
    );

    expect(items.map(i => [i.product.id, i.effectivePrice])).toEqual([['sp-1', 80]]);
    expect(alerts).toEqual([{
      type: 'invalid_price',
      sellerProductId: 'sp-2',
      reason: 'Seller product sp-2 has a negative base price (-3)',
    }]);
  });
});

describe('priceListings', () => {
  const today = '2024-03-15';
  const discountsById = {
    'd-20': discount(),
    'd-old': discount({id: 'd-old', value: 50, validFrom: '2023-01-01', validTo: '2023-01-31'}),
  };

  it('applies each listing\'s own current discount in input order', () => {
    const {items, alerts} = priceListings([
      listing({id: 'sp-1', price: 100, discountId: 'd-20'}),
      listing({id: 'sp-2', price: 40, discountId: null}),
      listing({id: 'sp-3', price: 10, discountId: 'd-old'}),
      listing({id: 'sp-4', price: 50, discountId: 'd-20'}),
    ], discountsById, today);

    expect(items.map(i => [i.product.id, i.effectivePrice])).toEqual([
      ['sp-1', 80],
      ['sp-2', 40],
      ['sp-3', 10],
      ['sp-4', 40],
    ]);
    expect(items[2].discount).toBeNull();
    expect(alerts).toEqual([]);
  });

  it('ignores inherited properties of the discount lookup', () => {
    const {items} = priceListings([listing({price: 25, discountId: 'constructor'})], discountsById, today);

    expect(items.map(i => [i.effectivePrice, i.discount])).toEqual([[25, null]]);
  });

  it('shows base prices when the attached discount is unknown', () => {
    const {items} = priceListings([listing({price: 25, discountId: 'd-gone'})], discountsById, today);

    expect(items.map(i => i.effectivePrice)).toEqual([25]);
  });
});

describe('toIntegrityAlert', () => {
  it('maps a price error to an alert', () => {
    expect(toIntegrityAlert({kind: 'InvalidPrice', sellerProductId: 'sp-7', message: 'bad'})).toEqual({
      type: 'invalid_price',
      sellerProductId: 'sp-7',
      reason: 'bad',
    });
  });
});
