import {
  ProductCategoryCreateSchema,
  ProductCategorySchema,
  ProductCategoryUpdateSchema,
  type ProductCategory,
  type ProductCategoryCreate,
  type ProductCategoryUpdate,
} from '../schemas/product-category.js';
import { ResourceEndpoint, type ApiRequester } from './base.js';

// The collection path has no separator: /productcategories
export class ProductCategoriesResource extends ResourceEndpoint<
  ProductCategory,
  ProductCategoryCreate,
  ProductCategoryUpdate
> {
  constructor(client: ApiRequester) {
    super(client, '/productcategories', 'product category', {
      record: ProductCategorySchema,
      create: ProductCategoryCreateSchema,
      update: ProductCategoryUpdateSchema,
    });
  }
}
