import { z } from 'zod';

// The API is inconsistent about numeric vs string ids; records always expose strings
export const IdSchema = z.union([z.string().min(1), z.number()]).transform((id) => String(id));

export const CustomFieldsSchema = z.record(z.union([z.string(), z.number(), z.boolean(), z.null()]));

export type CustomFields = z.infer<typeof CustomFieldsSchema>;
