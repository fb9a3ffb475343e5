import express from 'express';
import cors from 'cors';
import optimizeRoutes from './routes/optimizeRoutes';
import catalogRoutes from './routes/catalogRoutes';
import healthRoutes from './routes/healthRoutes';
import {
  addRequestId,
  errorHandler,
  notFoundHandler
} from './middleware/errorHandler';
import { requestLoggingMiddleware } from './middleware/requestLogger';
import { getCorsOrigins } from './config/serverConfig';

const app = express();

// Request ID middleware (must be first)
app.use(addRequestId);

const corsOrigins = getCorsOrigins();
app.use(cors(corsOrigins ? { origin: corsOrigins } : undefined));

// Body parsing middleware
app.use(express.json({ limit: '1mb' }));

// Request logging middleware (after body parsing)
app.use(requestLoggingMiddleware);

// API Routes
app.use('/api', healthRoutes);
app.use('/api', catalogRoutes);
app.use('/api', optimizeRoutes);

// 404 handler for unmatched routes
app.use(notFoundHandler);

// Global error handler (must be last)
app.use(errorHandler);

export default app;
