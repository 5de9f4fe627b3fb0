// Module product types

import {
    Category,
    PricedSellerProduct,
    Product,
    ProductDiscount,
    SellerProduct,
    Store,
} from "../domain";

export type PricingError =
    | {
        readonly kind: 'InvalidDiscount';
        readonly discountId: string;
        readonly message: string;
    }
    | {
        readonly kind: 'InvalidPrice';
        readonly sellerProductId: string;
        readonly message: string;
    };

export type StorefrontErrorKind = 'NotFound' | 'Forbidden' | 'Conflict' | 'Validation';

export type StorefrontError = {
    readonly kind: StorefrontErrorKind;
    readonly message: string;
};

export type IntegrityAlert =
    | {
        readonly type: 'invalid_discount';
        readonly discountId: string;
        readonly reason: string;
    }
    | {
        readonly type: 'invalid_price';
        readonly sellerProductId: string;
        readonly reason: string;
    };

export type DisplayPricing = {
    readonly items: PricedSellerProduct[];
    readonly alerts: IntegrityAlert[];
};

export type SellerProductInput = {
    readonly storeId: string;
    readonly productId: string;
    readonly price: number;
    readonly quantity: number;
    readonly discountId: string | null;
};

export type SellerProductChanges = {
    readonly price: number;
    readonly quantity: number;
    readonly discountId: string | null;
};

export type ProductRequestInput = {
    readonly storeId: string;
    readonly name: string;
    readonly categoryId: string;
    readonly description: string;
};

export type ProductOption = {
    readonly id: string;
    readonly name: string;
};

export type DiscountDetail = {
    readonly discount: ProductDiscount;
    readonly isCurrent: boolean;
    readonly products: PricedSellerProduct[];
};

export type StoreDetail = {
    readonly store: Store;
    readonly products: PricedSellerProduct[];
};

export type SellersRoom = {
    readonly stores: Store[];
    readonly categories: Category[];
    readonly sellerProducts: SellerProduct[];
};

export type SellerProductForm = {
    readonly categories: Category[];
    readonly products: Product[];
    readonly discounts: ProductDiscount[];
    readonly stores: Store[];
};
