import dotenv from 'dotenv';
import { promises as fs } from 'fs';
import { join } from 'path';
import { z } from 'zod';
import { loadConfig } from '../config/config';
import { PRODUCT_STATUSES } from '../types/product.types';
import { logger } from '../utils/logger';
import { Database, createDatabase } from './client';

const SEED_FILE = join(__dirname, 'seed-products.json');

const seedProductSchema = z.object({
     id: z.string().uuid(),
     name: z.string().min(1),
     description: z.string().nullable().default(null),
     price: z.number().min(0),
     currency: z.string().min(1).optional(),
     stock: z.number().int().min(0).default(0),
     status: z.enum(PRODUCT_STATUSES).default('ACTIVE'),
});

export type SeedProduct = z.infer<typeof seedProductSchema>;

export async function loadSeedProducts(file: string = SEED_FILE): Promise<SeedProduct[]> {
     const raw: unknown = JSON.parse(await fs.readFile(file, 'utf-8'));
     return z.array(seedProductSchema).parse(raw);
}

async function seedDatabase(database: Database, defaultCurrency: string, file: string = SEED_FILE) {
     const products = await loadSeedProducts(file);
     logger.info({ count: products.length }, 'Seeding database with sample products');

     const inserted = await database.withTransaction(async (client) => {
          let count = 0;
          for (const product of products) {
               const result = await client.query(
                    `
          INSERT INTO products (id, name, description, price, currency, stock, status)
          VALUES ($1, $2, $3, $4, $5, $6, $7)
          ON CONFLICT (id) DO NOTHING
        `,
                    [
                         product.id,
                         product.name,
                         product.description,
                         product.price,
                         product.currency ?? defaultCurrency,
                         product.stock,
                         product.status,
                    ]
               );
               count += result.rowCount ?? 0;
          }
          return count;
     });

     logger.info({ inserted, skipped: products.length - inserted }, 'Database seeding completed');
     return inserted;
}

async function main() {
     dotenv.config();
     const config = loadConfig();
     const database = createDatabase(config.database);
     try {
          await seedDatabase(database, config.orders.defaultCurrency);
     } finally {
          await database.close();
     }
}

// Run if executed directly
if (require.main === module) {
     main().catch((err) => {
          logger.error({ err }, 'Seeding failed');
          process.exit(1);
     });
}

export { seedDatabase };
