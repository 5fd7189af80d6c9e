import express, { Express } from 'express';
import cors from 'cors';
import compression from 'compression';
import { createRouter, RouterDependencies } from './routes';
import { errorHandler } from './errorHandlers';

export function createApp(deps: RouterDependencies): Express {
    const app = express();
    app.set('trust proxy', ['loopback', 'linklocal', 'uniquelocal']);

    // CORS settings
    app.use(cors({
        origin: '*',
        methods: ['GET', 'POST', 'OPTIONS'],
        allowedHeaders: ['Content-Type', 'Authorization', 'x-admin-key'],
        maxAge: 86400
    }));

    // Compression middleware - Compresses HTTP responses
    app.use(compression());

    // Middleware
    app.use(express.json());

    // Routes - Add /api prefix
    app.use('/api', createRouter(deps));

    // Basic route for testing
    app.get('/', (req, res) => {
        res.json({ message: 'Subnet Yield Indexer API' });
    });

    // Error handling
    app.use(errorHandler);

    return app;
}
