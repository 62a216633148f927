export const PRODUCT_STATUSES = ['ACTIVE', 'INACTIVE'] as const;
export type ProductStatus = (typeof PRODUCT_STATUSES)[number];

export interface Product {
     id: string;
     name: string;
     description: string | null;
     price: number;
     currency: string;
     stock: number;
     status: ProductStatus;
     createdAt: Date;
     updatedAt: Date;
}

export interface CreateProductRequest {
     name: string;
     description?: string | null;
     price: number;
     currency?: string;
     stock?: number;
     status?: ProductStatus;
}

export type UpdateProductRequest = {
     [K in keyof CreateProductRequest]?: CreateProductRequest[K] | null;
};
