import { FastifyInstance } from 'fastify';
import { ProductService } from '@order-service/shared/src/services/product-service';
import type { Pagination } from '@order-service/shared/src/types/order.types';
import type {
     CreateProductRequest,
     UpdateProductRequest,
} from '@order-service/shared/src/types/product.types';
import {
     createProductSchema,
     deleteProductSchema,
     getProductSchema,
     listProductsSchema,
     updateProductSchema,
} from '../schemas/product.schemas';
import { serializeProduct } from '../serializers';

export interface ProductRoutesOptions {
     productService: ProductService;
}

interface ProductParams {
     id: string;
}

export async function registerProductRoutes(app: FastifyInstance, options: ProductRoutesOptions) {
     const { productService } = options;

     app.post<{ Body: CreateProductRequest }>(
          '/',
          { schema: createProductSchema },
          async (request, reply) => {
               const product = await productService.createProduct(request.body);
               reply.code(201);
               return serializeProduct(product);
          }
     );

     app.get<{ Querystring: Pagination }>(
          '/',
          { schema: listProductsSchema },
          async (request) => {
               const products = await productService.listProducts(request.query);
               return products.map(serializeProduct);
          }
     );

     app.get<{ Params: ProductParams }>(
          '/:id',
          { schema: getProductSchema },
          async (request) => serializeProduct(await productService.getProduct(request.params.id))
     );

     app.patch<{ Params: ProductParams; Body: UpdateProductRequest }>(
          '/:id',
          { schema: updateProductSchema },
          async (request) => {
               const product = await productService.updateProduct(request.params.id, request.body ?? {});
               return serializeProduct(product);
          }
     );

     app.delete<{ Params: ProductParams }>(
          '/:id',
          { schema: deleteProductSchema },
          async (request, reply) => {
               await productService.deleteProduct(request.params.id);
               return reply.code(204).send();
          }
     );
}
