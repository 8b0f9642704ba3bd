import { Pool, type PoolClient } from 'pg';
import { env } from '../config/env';

export interface ReportRecord {
    name: string;
    mobile_no: string;
    pan_card: string;
    email: string;
    report_date: string;
    score: number;
    ckyc: string;
    summary: string;
    url: string;
}

export type StoredReportRef = {
    report_date: Date;
    url: string | null;
};

export interface ReportStore {
    findLatest(name: string, panCard: string): Promise<StoredReportRef | null>;
    deleteAll(name: string, panCard: string): Promise<void>;
    insert(record: ReportRecord): Promise<void>;
}

export interface ReportRepository extends ReportStore {
    /** Runs `work` against a store whose writes commit or roll back together. */
    transaction<T>(work: (store: ReportStore) => Promise<T>): Promise<T>;
}

class PgReportStore implements ReportStore {
    constructor(private readonly client: PoolClient) {}

    async findLatest(name: string, panCard: string): Promise<StoredReportRef | null> {
        const { rows } = await this.client.query<StoredReportRef>(
            `SELECT report_date, url
             FROM public.credit_reports
             WHERE name = $1 AND pan_card = $2
             ORDER BY report_date DESC
             LIMIT 1`,
            [name, panCard],
        );
        return rows[0] ?? null;
    }

    async deleteAll(name: string, panCard: string): Promise<void> {
        await this.client.query('DELETE FROM public.credit_reports WHERE name = $1 AND pan_card = $2', [name, panCard]);
    }

    async insert(record: ReportRecord): Promise<void> {
        await this.client.query(
            `INSERT INTO public.credit_reports
             (name, mobile_no, pan_card, email, report_date, score, ckyc, summary, url)
             VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)`,
            [
                record.name,
                record.mobile_no,
                record.pan_card,
                record.email,
                record.report_date,
                record.score,
                record.ckyc,
                record.summary,
                record.url,
            ],
        );
    }
}

export class PgReportRepository implements ReportRepository {
    /** Takes a pool provider so the pool is only opened on first use. */
    constructor(private readonly pool: () => Pool) {}

    private async withClient<T>(work: (store: ReportStore) => Promise<T>): Promise<T> {
        const client = await this.pool().connect();
        try {
            return await work(new PgReportStore(client));
        } finally {
            client.release();
        }
    }

    findLatest(name: string, panCard: string): Promise<StoredReportRef | null> {
        return this.withClient(store => store.findLatest(name, panCard));
    }

    deleteAll(name: string, panCard: string): Promise<void> {
        return this.withClient(store => store.deleteAll(name, panCard));
    }

    insert(record: ReportRecord): Promise<void> {
        return this.withClient(store => store.insert(record));
    }

    async transaction<T>(work: (store: ReportStore) => Promise<T>): Promise<T> {
        const client = await this.pool().connect();
        try {
            await client.query('BEGIN');
            const result = await work(new PgReportStore(client));
            await client.query('COMMIT');
            return result;
        } catch (err) {
            await client.query('ROLLBACK');
            throw err;
        } finally {
            client.release();
        }
    }
}

let sharedPool: Pool | null = null;

export function getPool(): Pool {
    if (!env.DATABASE_URL) {
        throw new Error('DATABASE_URL is not configured.');
    }
    sharedPool ??= new Pool({ connectionString: env.DATABASE_URL });
    return sharedPool;
}

export const reportRepository: ReportRepository = new PgReportRepository(getPool);
