import { Injectable, NestMiddleware, Logger } from '@nestjs/common';
import { Request, Response, NextFunction } from 'express';
import { maskToken } from '../card/utils/mask.utils';

@Injectable()
export class RequestLoggerMiddleware implements NestMiddleware {
  private logger = new Logger('HTTP');

  use(req: Request, res: Response, next: NextFunction) {
    const { ip, method, originalUrl } = req;
    const userAgent = req.get('user-agent') || '';

    if (method === 'POST') {
      this.logger.log(
        `Request Body: ${JSON.stringify(redactBody(req.body))}`
      );
    }

    res.on('finish', () => {
      const { statusCode } = res;
      const contentLength = res.get('content-length');

      this.logger.log(
        `${method} ${originalUrl} ${statusCode} ${contentLength} - ${userAgent} ${ip}`
      );
    });

    next();
  }
}

// Card tokens keep their last four digits, verification values are never logged
export function redactBody(body: unknown): unknown {
  if (typeof body !== 'object' || body === null || Array.isArray(body)) {
    return body;
  }

  const redacted: Record<string, unknown> = { ...body };
  if (typeof redacted.token === 'string') {
    redacted.token = maskToken(redacted.token);
  } else if (redacted.token !== undefined) {
    redacted.token = '***';
  }
  if (redacted.verificationValue !== undefined) {
    redacted.verificationValue = '***';
  }
  return redacted;
}
