import type { Request, Response, NextFunction } from 'express';
import type { LogData } from '../utils/logger';
import { Logger } from '../utils/logger';

const MAX_BODY_LOG_LENGTH = 1000;
const MAX_RESPONSE_LOG_LENGTH = 2000;

function truncateForLog(value: unknown, maxLength: number, placeholder: string): unknown {
  const serialized = JSON.stringify(value);
  return serialized !== undefined && serialized.length > maxLength ? placeholder : value;
}

function isNonEmptyObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && Object.keys(value).length > 0;
}

export function requestLogger(req: Request, res: Response, next: NextFunction): void {
  const startTime = Date.now();
  const { method, originalUrl } = req;
  const ip = req.ip || req.socket.remoteAddress;

  const requestData: LogData = { method, url: originalUrl, ip };
  if (Object.keys(req.query).length > 0) {
    requestData.query = req.query;
  }

  Logger.debug('📥 Incoming Request', requestData);

  // Capture JSON bodies so error responses can be logged with their payload
  let responseBody: unknown;
  const originalJson = res.json.bind(res);
  res.json = (payload?: unknown) => {
    responseBody = payload;
    return originalJson(payload);
  };

  res.on('finish', () => {
    const { statusCode } = res;
    const responseData: LogData = {
      method,
      url: originalUrl,
      statusCode,
      duration: `${Date.now() - startTime}ms`,
      ip,
    };

    // Body parsers run after this middleware, so the parsed body is only available here
    const requestBody: unknown = req.body;
    if (statusCode >= 400 && isNonEmptyObject(requestBody)) {
      responseData.requestBody = truncateForLog(requestBody, MAX_BODY_LOG_LENGTH, '[Body too large to log]');
    }
    if (responseBody !== undefined && statusCode >= 400) {
      responseData.responseBody = truncateForLog(responseBody, MAX_RESPONSE_LOG_LENGTH, '[Response too large to log]');
    }

    if (statusCode >= 500) {
      Logger.error(`❌ ${statusCode} Server Error`, undefined, responseData);
    } else if (statusCode >= 400) {
      Logger.warn(`⚠️  ${statusCode} Client Error`, responseData);
    } else if (statusCode >= 300) {
      Logger.info(`↪️  ${statusCode} Redirect`, responseData);
    } else {
      Logger.info(`✅ ${statusCode} Success`, responseData);
    }
  });

  next();
}

export function errorLogger(error: Error, req: Request, res: Response, next: NextFunction): void {
  const { method, originalUrl, params, query } = req;

  Logger.error('💥 Unhandled Error in Request', error, {
    method,
    url: originalUrl,
    ip: req.ip || req.socket.remoteAddress,
    params: Object.keys(params).length > 0 ? params : undefined,
    query: Object.keys(query).length > 0 ? query : undefined,
  });

  next(error);
}
