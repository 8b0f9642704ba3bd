import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';
import multer from 'multer';
import rateLimit from 'express-rate-limit';
import { env } from './config/env';
import reportsRoutes from './routes/reports';

const app = express();

// Trust Proxy for load balancers in front of the service
app.set('trust proxy', 1);

const limiter = rateLimit({
    windowMs: 15 * 60 * 1000, // 15 minutes
    limit: 100,
    standardHeaders: 'draft-7',
    legacyHeaders: false,
});

// Middleware
app.use(helmet());
app.use(express.json({ limit: '1mb' }));
app.use(morgan('dev'));

const allowedOrigins = env.CORS_ORIGIN === '*'
    ? null
    : env.CORS_ORIGIN.split(',').map(origin => origin.trim()).filter(Boolean);

app.use(cors({
    origin: (origin, callback) => {
        // Allow curl and server-to-server callers (no origin)
        if (!origin || !allowedOrigins || allowedOrigins.includes(origin)) {
            callback(null, true);
        } else {
            console.warn(`Blocked CORS origin: ${origin}`);
            callback(new Error('Not allowed by CORS'));
        }
    },
}));

app.use(limiter);

// Health Check
app.get('/health', (req, res) => {
    res.json({
        status: 'ok',
        env: env.NODE_ENV,
        timestamp: new Date().toISOString(),
    });
});

// Routes
app.use('/api/reports', reportsRoutes);

// Error Handling
app.use((err: unknown, req: express.Request, res: express.Response, next: express.NextFunction) => {
    if (res.headersSent) {
        return next(err);
    }
    if (err instanceof multer.MulterError) {
        return res.status(400).json({ error: err.message });
    }
    console.error(err instanceof Error ? err.stack : err);
    res.status(500).json({ error: 'Internal Server Error' });
});

// Start Server
app.listen(Number(env.PORT), () => {
    console.log(`Credit report service running on port ${env.PORT}`);
    console.log(`Environment: ${env.NODE_ENV}`);
    console.log(`CORS Policy: ${env.CORS_ORIGIN || 'All (Default)'}`);
});
