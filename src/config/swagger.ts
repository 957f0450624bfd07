import path from 'path';
import swaggerJsdoc from 'swagger-jsdoc';
import { env } from './env';

const options: swaggerJsdoc.Options = {
  definition: {
    openapi: '3.0.0',
    info: {
      title: env.SWAGGER_TITLE,
      version: env.SWAGGER_VERSION,
      description: 'Shop catalogue categories and GST rule management and resolution',
    },
    servers: [
      {
        url: env.API_URL,
        description: 'API server',
      },
    ],
  },
  // Route files sit beside this directory both in src/ (ts) and dist/ (js)
  apis: [path.join(__dirname, '..', 'routes', '*.{ts,js}')],
};

export function setupSwagger(): object {
  return swaggerJsdoc(options);
}
