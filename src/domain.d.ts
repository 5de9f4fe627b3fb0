// Domain types shared across the application

// Calendar date as YYYY-MM-DD
export type IsoDate = string;

export type DiscountKind = 'percentage' | 'fixed_amount';

export type ProductDiscount = {
  readonly id: string;
  readonly slug: string;
  readonly title: string;
  readonly description: string;
  readonly kind: DiscountKind;
  readonly value: number;
  readonly validFrom: IsoDate;
  readonly validTo: IsoDate;
  readonly isActive: boolean;
  // Store-wide discounts cover every listing of storeId (or of every store when null)
  readonly storeWide: boolean;
  readonly storeId: string | null;
};

export type SellerProduct = {
  readonly id: string;
  readonly productId: string;
  readonly productName: string;
  readonly storeId: string;
  readonly price: number;
  readonly quantity: number;
  readonly discountId: string | null;
};

export type Store = {
  readonly id: string;
  readonly slug: string;
  readonly title: string;
  readonly description: string;
  readonly ownerId: string;
  readonly email: string;
  readonly phone: string | null;
};

export type Category = {
  readonly id: string;
  readonly title: string;
  readonly parentId: string | null;
};

export type Product = {
  readonly id: string;
  readonly name: string;
  readonly categoryId: string;
};

export type User = {
  readonly id: string;
  readonly email: string;
  readonly username: string | null;
  readonly groups: readonly string[];
};

export type Permission = 'sellers' | 'content_manager';

export type PricedSellerProduct = {
  readonly product: SellerProduct;
  readonly originalPrice: number;
  readonly effectivePrice: number;
  readonly discount: ProductDiscount | null;
};

export type ProductRequest = {
  readonly id: string;
  readonly storeId: string;
  readonly requestedBy: string;
  readonly name: string;
  readonly categoryId: string;
  readonly description: string;
  // ISO timestamp; survives serialization between workflow and activities
  readonly createdAt: string;
};

export type SellerAccessRequest = {
  readonly id: string;
  readonly userId: string;
  readonly createdAt: string;
};

export type Page<T> = {
  readonly items: T[];
  readonly page: number;
  readonly pageSize: number;
  readonly totalItems: number;
  readonly totalPages: number;
  readonly hasPrevious: boolean;
  readonly hasNext: boolean;
};
