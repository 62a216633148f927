import type { Database } from '../db/client';
import { OrderRepository, PgOrderRepository } from './order-repository';
import { PgProductRepository, ProductRepository } from './product-repository';

export interface Repositories {
     orders: OrderRepository;
     products: ProductRepository;
}

/**
 * Runs a unit of work in its own transaction. Everything written through the
 * repositories handed to `fn` commits together or not at all.
 */
export interface UnitOfWork {
     run<T>(fn: (repositories: Repositories) => Promise<T>): Promise<T>;
}

export class PgUnitOfWork implements UnitOfWork {
     constructor(private readonly database: Database) {}

     run<T>(fn: (repositories: Repositories) => Promise<T>): Promise<T> {
          return this.database.withTransaction((client) =>
               fn({
                    orders: new PgOrderRepository(client),
                    products: new PgProductRepository(client),
               })
          );
     }
}
