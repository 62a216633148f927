import { PoolClient } from 'pg';
import type { Pagination } from '../types/order.types';
import { PRODUCT_STATUSES, Product, ProductStatus } from '../types/product.types';
import { rethrowUniqueViolation } from './pg-errors';

export interface ProductRepository {
     insert(product: Product): Promise<Product>;
     findById(id: string): Promise<Product | null>;
     /** One query for the whole set; ids that do not exist are simply absent. */
     findByIds(ids: string[]): Promise<Product[]>;
     list(page: Pagination): Promise<Product[]>;
     update(product: Product): Promise<void>;
     delete(id: string): Promise<boolean>;
}

interface ProductRow {
     id: string;
     name: string;
     description: string | null;
     price: number;
     currency: string;
     stock: number;
     status: string;
     created_at: Date;
     updated_at: Date;
}

const PRODUCT_COLUMNS =
     'id, name, description, price, currency, stock, status, created_at, updated_at';

function toStatus(value: string): ProductStatus {
     return PRODUCT_STATUSES.find((status) => status === value) ?? 'INACTIVE';
}

function toProduct(row: ProductRow): Product {
     return {
          id: row.id,
          name: row.name,
          description: row.description,
          price: row.price,
          currency: row.currency,
          stock: row.stock,
          status: toStatus(row.status),
          createdAt: row.created_at,
          updatedAt: row.updated_at,
     };
}

export class PgProductRepository implements ProductRepository {
     constructor(private readonly client: PoolClient) {}

     async insert(product: Product): Promise<Product> {
          try {
               const { rows } = await this.client.query<ProductRow>(
                    `
        INSERT INTO products (id, name, description, price, currency, stock, status, created_at, updated_at)
        VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)
        RETURNING ${PRODUCT_COLUMNS}
      `,
                    [
                         product.id,
                         product.name,
                         product.description,
                         product.price,
                         product.currency,
                         product.stock,
                         product.status,
                         product.createdAt,
                         product.updatedAt,
                    ]
               );
               return toProduct(rows[0]);
          } catch (error) {
               rethrowUniqueViolation(error);
          }
     }

     async findById(id: string): Promise<Product | null> {
          const { rows } = await this.client.query<ProductRow>(
               `SELECT ${PRODUCT_COLUMNS} FROM products WHERE id = $1`,
               [id]
          );
          return rows.length > 0 ? toProduct(rows[0]) : null;
     }

     async findByIds(ids: string[]): Promise<Product[]> {
          if (ids.length === 0) {
               return [];
          }
          const { rows } = await this.client.query<ProductRow>(
               `SELECT ${PRODUCT_COLUMNS} FROM products WHERE id = ANY($1::text[])`,
               [ids]
          );
          return rows.map(toProduct);
     }

     async list(page: Pagination): Promise<Product[]> {
          const { rows } = await this.client.query<ProductRow>(
               `
      SELECT ${PRODUCT_COLUMNS}
      FROM products
      ORDER BY updated_at DESC, id
      OFFSET $1 LIMIT $2
    `,
               [page.skip, page.limit]
          );
          return rows.map(toProduct);
     }

     async update(product: Product): Promise<void> {
          await this.client.query(
               `
      UPDATE products
      SET name = $1,
          description = $2,
          price = $3,
          currency = $4,
          stock = $5,
          status = $6,
          updated_at = $7
      WHERE id = $8
    `,
               [
                    product.name,
                    product.description,
                    product.price,
                    product.currency,
                    product.stock,
                    product.status,
                    product.updatedAt,
                    product.id,
               ]
          );
     }

     async delete(id: string): Promise<boolean> {
          const result = await this.client.query(`DELETE FROM products WHERE id = $1`, [id]);
          return (result.rowCount ?? 0) > 0;
     }
}
