import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const hour = z.coerce.number().int().min(0).max(23);

const envSchema = z.object({
    PORT: z.string().default('3001'),
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    CORS_ORIGIN: z.string().default('*'),
    DATABASE_URL: z.string().optional(),
    SUPABASE_URL: z.string().optional(),
    SUPABASE_KEY: z.string().optional(),
    STORAGE_BUCKET: z.string().default('credit-reports'),
    LOCAL_STORAGE_DIR: z.string().default('local_storage'),
    UPLOAD_WINDOW_START_HOUR: hour.default(10),
    UPLOAD_WINDOW_END_HOUR: hour.default(20),
    MAX_UPLOAD_BYTES: z.coerce.number().int().positive().default(10 * 1024 * 1024),
}).refine(cfg => cfg.UPLOAD_WINDOW_START_HOUR < cfg.UPLOAD_WINDOW_END_HOUR, {
    message: 'UPLOAD_WINDOW_START_HOUR must be earlier than UPLOAD_WINDOW_END_HOUR',
    path: ['UPLOAD_WINDOW_START_HOUR'],
});

export type Env = z.infer<typeof envSchema>;

export const env: Readonly<Env> = Object.freeze(envSchema.parse(process.env));
