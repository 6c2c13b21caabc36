/**
 * product.ts: Zod schemas for products, with nested price and stock info.
 */

import { z } from 'zod';
import { CustomFieldsSchema, IdSchema } from './common.js';

export const PriceInfoSchema = z.object({
  price: z.number(),
  currency: z.string().default('NOK'),
  vat_rate: z.number().nullish(),
  discount: z.number().nullish(),
  unit: z.string().nullish(),
});

export type PriceInfo = z.infer<typeof PriceInfoSchema>;

export const StockInfoSchema = z.object({
  quantity: z.number().int().default(0),
  reorder_point: z.number().int().nullish(),
  location: z.string().nullish(),
});

export type StockInfo = z.infer<typeof StockInfoSchema>;

const productFields = {
  name: z.string().min(1),
  description: z.string().nullish(),
  sku: z.string().nullish(),
  barcode: z.string().nullish(),
  category: z.string().nullish(),
  brand: z.string().nullish(),
  price_info: PriceInfoSchema.nullish(),
  stock_info: StockInfoSchema.nullish(),
  tax_code: z.string().nullish(),
  is_service: z.boolean().optional(),
  is_active: z.boolean().optional(),
  custom_fields: CustomFieldsSchema.nullish(),
};

export const ProductCreateSchema = z.object(productFields);

export type ProductCreate = z.input<typeof ProductCreateSchema>;

export const ProductUpdateSchema = z.object(productFields).partial();

export type ProductUpdate = z.input<typeof ProductUpdateSchema>;

export const ProductSchema = z.object({
  ...productFields,
  id: IdSchema,
  is_service: z.boolean().default(false),
  is_active: z.boolean().default(true),
  created_at: z.string(),
  updated_at: z.string(),
});

export type Product = z.infer<typeof ProductSchema>;
