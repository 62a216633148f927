import type { UnitOfWork } from '../repositories/unit-of-work';
import type { Pagination } from '../types/order.types';
import {
     CreateProductRequest,
     PRODUCT_STATUSES,
     Product,
     UpdateProductRequest,
} from '../types/product.types';
import {
     ProductNotFoundError,
     UniqueViolationError,
     ValidationError,
     ValidationIssue,
} from '../utils/errors';
import { createChildLogger } from '../utils/logger';
import { generateProductId } from './order-code-generator';

const log = createChildLogger({ component: 'product-service' });

const MAX_ID_ATTEMPTS = 3;

export interface ProductServiceDependencies {
     unitOfWork: UnitOfWork;
     defaultCurrency: string;
     clock?: () => Date;
     idGenerator?: () => string;
}

function validateFields(fields: UpdateProductRequest): ValidationIssue[] {
     const issues: ValidationIssue[] = [];
     if (fields.name != null && fields.name.trim() === '') {
          issues.push({ path: 'name', message: 'must not be empty' });
     }
     if (fields.price != null && (!Number.isFinite(fields.price) || fields.price < 0)) {
          issues.push({ path: 'price', message: 'must be greater than or equal to 0' });
     }
     if (fields.stock != null && (!Number.isInteger(fields.stock) || fields.stock < 0)) {
          issues.push({ path: 'stock', message: 'must be a non-negative integer' });
     }
     if (fields.status != null && !PRODUCT_STATUSES.includes(fields.status)) {
          issues.push({ path: 'status', message: `must be one of ${PRODUCT_STATUSES.join(', ')}` });
     }
     return issues;
}

export class ProductService {
     private readonly unitOfWork: UnitOfWork;
     private readonly defaultCurrency: string;
     private readonly clock: () => Date;
     private readonly idGenerator: () => string;

     constructor(dependencies: ProductServiceDependencies) {
          this.unitOfWork = dependencies.unitOfWork;
          this.defaultCurrency = dependencies.defaultCurrency;
          this.clock = dependencies.clock ?? (() => new Date());
          this.idGenerator = dependencies.idGenerator ?? generateProductId;
     }

     async createProduct(request: CreateProductRequest): Promise<Product> {
          const issues = validateFields(request);
          if (request.name == null) {
               issues.unshift({ path: 'name', message: 'is required' });
          }
          if (request.price == null) {
               issues.push({ path: 'price', message: 'is required' });
          }
          if (issues.length > 0) {
               throw ValidationError.fromIssues(issues);
          }

          const now = this.clock();
          for (let attempt = 1; ; attempt++) {
               const product: Product = {
                    id: this.idGenerator(),
                    name: request.name.trim(),
                    description: request.description ?? null,
                    price: request.price,
                    currency: request.currency || this.defaultCurrency,
                    stock: request.stock ?? 0,
                    status: request.status ?? 'ACTIVE',
                    createdAt: now,
                    updatedAt: now,
               };
               try {
                    const created = await this.unitOfWork.run((repositories) =>
                         repositories.products.insert(product)
                    );
                    log.info({ productId: created.id, name: created.name }, 'Product created');
                    return created;
               } catch (error) {
                    if (error instanceof UniqueViolationError && attempt < MAX_ID_ATTEMPTS) {
                         log.warn({ productId: product.id, attempt }, 'Product id collision, retrying');
                         continue;
                    }
                    throw error;
               }
          }
     }

     listProducts(page: Pagination): Promise<Product[]> {
          return this.unitOfWork.run((repositories) => repositories.products.list(page));
     }

     async getProduct(id: string): Promise<Product> {
          const product = await this.unitOfWork.run((repositories) =>
               repositories.products.findById(id)
          );
          if (!product) {
               throw new ProductNotFoundError(id);
          }
          return product;
     }

     /** Applies the non-null fields of `changes`; existing order items keep their snapshots. */
     async updateProduct(id: string, changes: UpdateProductRequest): Promise<Product> {
          const issues = validateFields(changes);
          if (issues.length > 0) {
               throw ValidationError.fromIssues(issues);
          }

          return this.unitOfWork.run(async (repositories) => {
               const current = await repositories.products.findById(id);
               if (!current) {
                    throw new ProductNotFoundError(id);
               }

               const updated: Product = {
                    ...current,
                    name: changes.name != null ? changes.name.trim() : current.name,
                    description: changes.description ?? current.description,
                    price: changes.price ?? current.price,
                    currency: changes.currency ?? current.currency,
                    stock: changes.stock ?? current.stock,
                    status: changes.status ?? current.status,
                    updatedAt: this.clock(),
               };
               await repositories.products.update(updated);
               log.info({ productId: id }, 'Product updated');
               return updated;
          });
     }

     async deleteProduct(id: string): Promise<void> {
          const deleted = await this.unitOfWork.run((repositories) =>
               repositories.products.delete(id)
          );
          if (!deleted) {
               throw new ProductNotFoundError(id);
          }
          log.info({ productId: id }, 'Product deleted');
     }
}
