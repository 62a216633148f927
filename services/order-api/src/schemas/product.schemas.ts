import { PRODUCT_STATUSES } from '@order-service/shared/src/types/product.types';
import { errorResponse, paginationQuerySchema } from './common.schemas';

const productResponse = {
     type: 'object',
     properties: {
          id: { type: 'string', format: 'uuid' },
          name: { type: 'string', example: 'Ceramic Coffee Mug' },
          description: { type: 'string', nullable: true, example: '350ml stoneware mug' },
          price: { type: 'number', example: 120000 },
          currency: { type: 'string', example: 'VND' },
          stock: { type: 'integer', example: 200 },
          status: { type: 'string', enum: [...PRODUCT_STATUSES] },
          createdAt: { type: 'string', format: 'date-time' },
          updatedAt: { type: 'string', format: 'date-time' },
     },
};

const productIdParams = {
     type: 'object',
     required: ['id'],
     properties: {
          id: { type: 'string', minLength: 1, description: 'Product id' },
     },
};

export const createProductSchema = {
     tags: ['products'],
     summary: 'Create a product',
     body: {
          type: 'object',
          required: ['name', 'price'],
          properties: {
               name: { type: 'string', minLength: 1, example: 'Ceramic Coffee Mug' },
               description: { type: 'string', nullable: true },
               price: { type: 'number', minimum: 0, example: 120000 },
               currency: { type: 'string', minLength: 1, example: 'VND' },
               stock: { type: 'integer', minimum: 0, example: 200 },
               status: { type: 'string', enum: [...PRODUCT_STATUSES] },
          },
     },
     response: {
          201: { description: 'Product created', ...productResponse },
          400: errorResponse('Invalid request'),
     },
};

export const listProductsSchema = {
     tags: ['products'],
     summary: 'List products',
     description: 'Most recently updated first',
     querystring: paginationQuerySchema,
     response: {
          200: { type: 'array', items: productResponse },
     },
};

export const getProductSchema = {
     tags: ['products'],
     summary: 'Get a product',
     params: productIdParams,
     response: {
          200: productResponse,
          404: errorResponse('Product not found'),
     },
};

export const updateProductSchema = {
     tags: ['products'],
     summary: 'Update a product',
     description:
          'Applies the non-null fields. Orders placed earlier keep the name and price they were priced with.',
     params: productIdParams,
     body: {
          type: 'object',
          properties: {
               name: { type: 'string', nullable: true, minLength: 1 },
               description: { type: 'string', nullable: true },
               price: { type: 'number', nullable: true, minimum: 0 },
               currency: { type: 'string', nullable: true, minLength: 1 },
               stock: { type: 'integer', nullable: true, minimum: 0 },
               status: { type: 'string', nullable: true, enum: [...PRODUCT_STATUSES, null] },
          },
     },
     response: {
          200: productResponse,
          400: errorResponse('Invalid request'),
          404: errorResponse('Product not found'),
     },
};

export const deleteProductSchema = {
     tags: ['products'],
     summary: 'Delete a product',
     params: productIdParams,
     response: {
          204: { description: 'Product deleted', type: 'null' },
          404: errorResponse('Product not found'),
     },
};
