import {
  CustomerCreateSchema,
  CustomerSchema,
  CustomerUpdateSchema,
  type Customer,
  type CustomerCreate,
  type CustomerUpdate,
} from '../schemas/customer.js';
import { ResourceEndpoint, type ApiRequester } from './base.js';

export class CustomersResource extends ResourceEndpoint<Customer, CustomerCreate, CustomerUpdate> {
  constructor(client: ApiRequester) {
    super(client, '/customers', 'customer', {
      record: CustomerSchema,
      create: CustomerCreateSchema,
      update: CustomerUpdateSchema,
    });
  }
}
