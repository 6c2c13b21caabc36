/**
 * product-category.ts: Zod schemas for product categories.
 *
 * Unlike the other resources, categories use camelCase on the wire
 * (parentId, alternativeReference, modifiedAt). A parentId of 0 means
 * top level.
 */

import { z } from 'zod';
import { IdSchema } from './common.js';

export const ProductCategorySchema = z.object({
  id: IdSchema,
  name: z.string(),
  parentId: z.coerce.number().int().nullish().transform((value) => value ?? 0),
  alternativeReference: z.string().nullish(),
  modifiedAt: z.string().nullish(),
});

export type ProductCategory = z.infer<typeof ProductCategorySchema>;

export const ProductCategoryCreateSchema = z.object({
  name: z.string().min(1),
  parentId: z.string().default('0'),
  alternativeReference: z.string().nullish(),
});

export type ProductCategoryCreate = z.input<typeof ProductCategoryCreateSchema>;

export const ProductCategoryUpdateSchema = z.object({
  name: z.string().min(1).optional(),
  parentId: z.string().optional(),
  alternativeReference: z.string().nullish(),
});

export type ProductCategoryUpdate = z.input<typeof ProductCategoryUpdateSchema>;
