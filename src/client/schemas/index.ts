/**
 * schemas/index.ts: Re-exports every resource schema and its TypeScript types.
 */

export { CustomFieldsSchema, IdSchema } from './common.js';
export type { CustomFields } from './common.js';

export {
  AddressSchema,
  ContactSchema,
  CustomerCreateSchema,
  CustomerSchema,
  CustomerUpdateSchema,
} from './customer.js';
export type { Address, Contact, Customer, CustomerCreate, CustomerUpdate } from './customer.js';

export {
  PriceInfoSchema,
  ProductCreateSchema,
  ProductSchema,
  ProductUpdateSchema,
  StockInfoSchema,
} from './product.js';
export type { PriceInfo, Product, ProductCreate, ProductUpdate, StockInfo } from './product.js';

export {
  ProductCategoryCreateSchema,
  ProductCategorySchema,
  ProductCategoryUpdateSchema,
} from './product-category.js';
export type { ProductCategory, ProductCategoryCreate, ProductCategoryUpdate } from './product-category.js';

export {
  InvoiceCreateSchema,
  InvoiceLineItemSchema,
  InvoiceSchema,
  InvoiceStatusSchema,
  InvoiceTotalsSchema,
  InvoiceUpdateSchema,
} from './invoice.js';
export type {
  Invoice,
  InvoiceCreate,
  InvoiceLineItem,
  InvoiceStatus,
  InvoiceTotals,
  InvoiceUpdate,
} from './invoice.js';
