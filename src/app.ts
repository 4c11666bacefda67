import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import cookieParser from 'cookie-parser';
import routes from '@/routes';
import { envConfig } from '@/config/env';
import { errorHandler } from '@/shared/middlewares/error.middleware';
import { HttpStatus } from '@/utils/http-status';

const app = express();

app.use(helmet());

const corsOrigins = envConfig.CORS_ORIGINS
  ? envConfig.CORS_ORIGINS.split(',').map((origin) => origin.trim()).filter(Boolean)
  : undefined;

app.use(
  cors({
    origin: corsOrigins && corsOrigins.length > 0 ? corsOrigins : true,
    credentials: true,
  }),
);
app.use(express.json({ limit: '1mb' }));
app.use(express.urlencoded({ extended: true }));
app.use(cookieParser());

app.use('/api', routes);

app.use((_req, res) => {
  res.status(HttpStatus.NOT_FOUND).json({ message: 'Route not found' });
});

app.use(errorHandler);

export default app;
