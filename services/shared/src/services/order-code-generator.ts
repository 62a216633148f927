import { randomInt, randomUUID } from 'crypto';
import { OrderCodeExhaustedError } from '../utils/errors';

export const ORDER_CODE_PREFIX = 'ORD';

export interface OrderCodeGenerator {
     next(): string;
}

function pad(value: number, width: number): string {
     return String(value).padStart(width, '0');
}

/** ORD-yyyyMMdd-HHmmss-NNNN in UTC */
export function formatOrderCode(now: Date, suffix: number): string {
     const date = `${now.getUTCFullYear()}${pad(now.getUTCMonth() + 1, 2)}${pad(now.getUTCDate(), 2)}`;
     const time = `${pad(now.getUTCHours(), 2)}${pad(now.getUTCMinutes(), 2)}${pad(now.getUTCSeconds(), 2)}`;
     return `${ORDER_CODE_PREFIX}-${date}-${time}-${pad(suffix, 4)}`;
}

export function createOrderCodeGenerator(
     clock: () => Date = () => new Date(),
     random: () => number = () => randomInt(0, 10000)
): OrderCodeGenerator {
     return {
          next: () => formatOrderCode(clock(), random()),
     };
}

/**
 * Draws codes until one is not yet taken in storage.
 */
export async function generateUniqueOrderCode(
     generator: OrderCodeGenerator,
     exists: (code: string) => Promise<boolean>,
     maxAttempts: number
): Promise<string> {
     for (let attempt = 1; attempt <= maxAttempts; attempt++) {
          const code = generator.next();
          if (!(await exists(code))) {
               return code;
          }
     }
     throw new OrderCodeExhaustedError(maxAttempts);
}

export function generateProductId(): string {
     return randomUUID();
}
