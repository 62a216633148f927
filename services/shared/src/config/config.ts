import { z } from 'zod';
import { ConfigError } from '../utils/errors';

export interface DatabaseConfig {
     connectionString: string;
     poolMin: number;
     poolMax: number;
     idleTimeoutMs: number;
     connectionTimeoutMs: number;
}

export interface ShipmentConfig {
     clientType: 'mock' | 'http';
     baseUrl: string | null;
     timeoutMs: number;
}

export interface OrderWorkflowConfig {
     maxOrderCodeAttempts: number;
     defaultCurrency: string;
     defaultReceiverAddress: string;
}

export interface ServerConfig {
     host: string;
     port: number;
     corsOrigins: string[];
}

export interface AppConfig {
     appName: string;
     env: string;
     server: ServerConfig;
     database: DatabaseConfig;
     shipment: ShipmentConfig;
     orders: OrderWorkflowConfig;
}

const port = z.coerce.number().int().min(1).max(65535);
const positiveInt = z.coerce.number().int().positive();

const envSchema = z
     .object({
          APP_NAME: z.string().min(1).default('order-service'),
          NODE_ENV: z.string().default('production'),
          PORT: port.optional(),
          ORDER_API_PORT: port.default(8000),
          ORDER_API_HOST: z.string().min(1).default('0.0.0.0'),
          CORS_ORIGINS: z.string().default('*'),

          DATABASE_URL: z.string().min(1).optional(),
          DB_HOST: z.string().min(1).optional(),
          DB_PORT: port.optional(),
          DB_USER: z.string().min(1).optional(),
          DB_PASSWORD: z.string().optional(),
          DB_NAME: z.string().min(1).optional(),
          DB_POOL_MIN: z.coerce.number().int().min(0).default(2),
          DB_POOL_MAX: positiveInt.default(10),
          DB_IDLE_TIMEOUT_MS: positiveInt.default(10000),
          DB_CONNECTION_TIMEOUT_MS: positiveInt.default(5000),

          SHIPMENT_CLIENT_TYPE: z.enum(['mock', 'http']).default('mock'),
          SHIPMENT_API_URL: z.string().url().optional(),
          SHIPMENT_API_TIMEOUT_MS: positiveInt.default(30000),

          ORDER_CODE_MAX_ATTEMPTS: positiveInt.default(5),
          DEFAULT_CURRENCY: z.string().min(1).default('VND'),
          DEFAULT_RECEIVER_ADDRESS: z.string().min(1).default('Ho Chi Minh City, Vietnam'),
     })
     .superRefine((env, ctx) => {
          const hasDiscreteDbSettings =
               env.DB_HOST && env.DB_PORT && env.DB_USER && env.DB_PASSWORD && env.DB_NAME;
          if (!env.DATABASE_URL && !hasDiscreteDbSettings) {
               ctx.addIssue({
                    code: z.ZodIssueCode.custom,
                    path: ['DATABASE_URL'],
                    message:
                         'Either DATABASE_URL must be set, or all of DB_HOST, DB_PORT, DB_USER, DB_PASSWORD and DB_NAME',
               });
          }
          if (env.SHIPMENT_CLIENT_TYPE === 'http' && !env.SHIPMENT_API_URL) {
               ctx.addIssue({
                    code: z.ZodIssueCode.custom,
                    path: ['SHIPMENT_API_URL'],
                    message: 'SHIPMENT_API_URL must be set for the http shipment client',
               });
          }
     });

type Env = z.infer<typeof envSchema>;

function buildConnectionString(env: Env): string {
     if (env.DATABASE_URL) {
          return env.DATABASE_URL;
     }
     const user = encodeURIComponent(env.DB_USER ?? '');
     const password = encodeURIComponent(env.DB_PASSWORD ?? '');
     return `postgresql://${user}:${password}@${env.DB_HOST}:${env.DB_PORT}/${env.DB_NAME}`;
}

function parseOrigins(raw: string): string[] {
     if (raw.trim() === '*') {
          return ['*'];
     }
     return raw
          .split(',')
          .map((origin) => origin.trim())
          .filter((origin) => origin.length > 0);
}

/**
 * Builds the process configuration from environment variables.
 * Called once at start-up; the result is passed to the components that need it.
 */
export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
     const parsed = envSchema.safeParse(source);
     if (!parsed.success) {
          throw new ConfigError(
               parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
          );
     }
     const env = parsed.data;

     const config: AppConfig = {
          appName: env.APP_NAME,
          env: env.NODE_ENV,
          server: {
               host: env.ORDER_API_HOST,
               port: env.PORT ?? env.ORDER_API_PORT,
               corsOrigins: parseOrigins(env.CORS_ORIGINS),
          },
          database: {
               connectionString: buildConnectionString(env),
               poolMin: env.NODE_ENV === 'test' ? 0 : env.DB_POOL_MIN,
               poolMax: env.NODE_ENV === 'test' ? 2 : env.DB_POOL_MAX,
               idleTimeoutMs: env.NODE_ENV === 'test' ? 100 : env.DB_IDLE_TIMEOUT_MS,
               connectionTimeoutMs: env.DB_CONNECTION_TIMEOUT_MS,
          },
          shipment: {
               clientType: env.SHIPMENT_CLIENT_TYPE,
               baseUrl: env.SHIPMENT_API_URL ?? null,
               timeoutMs: env.SHIPMENT_API_TIMEOUT_MS,
          },
          orders: {
               maxOrderCodeAttempts: env.ORDER_CODE_MAX_ATTEMPTS,
               defaultCurrency: env.DEFAULT_CURRENCY,
               defaultReceiverAddress: env.DEFAULT_RECEIVER_ADDRESS,
          },
     };

     return Object.freeze(config);
}
