import {
  ProductCreateSchema,
  ProductSchema,
  ProductUpdateSchema,
  type Product,
  type ProductCreate,
  type ProductUpdate,
} from '../schemas/product.js';
import { ResourceEndpoint, type ApiRequester } from './base.js';

export class ProductsResource extends ResourceEndpoint<Product, ProductCreate, ProductUpdate> {
  constructor(client: ApiRequester) {
    super(client, '/products', 'product', {
      record: ProductSchema,
      create: ProductCreateSchema,
      update: ProductUpdateSchema,
    });
  }
}
