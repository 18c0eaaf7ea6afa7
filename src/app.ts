import express from 'express';
import helmet from 'helmet';
import healthRouter from './routes/health.js';
import convertRouter from './routes/convert.js';
import { requestContext } from './middleware/request-context.js';
import { requireApiKey } from './middleware/api-key.js';
import { errorHandler, notFound } from './middleware/error-handler.js';

const app = express();

// Security headers
app.use(helmet());
app.use(requestContext);

// Public routes (no API key required)
app.use(healthRouter);

// Everything under /api needs an X-API-Key
app.use('/api', requireApiKey);
app.use(express.json());
app.use('/api/v1/convert', convertRouter);

app.use(notFound);
app.use(errorHandler);

export default app;
