import type { NextFunction, Request, Response } from 'express';

type RequestLogEntry = {
  event: 'http_request';
  requestId?: string;
  method: string;
  path: string;
  query?: Request['query'];
  status: number;
  durationMs: number;
  bytesOut: number;
  timestamp: string;
};

function logEntry(entry: RequestLogEntry): void {
  const line = JSON.stringify(entry);
  if (entry.status >= 500) {
    console.error(line);
  } else if (entry.status >= 400) {
    console.warn(line);
  } else {
    console.log(line);
  }
}

/** One JSON line per response; 4xx go to warn, 5xx to error. */
export function requestLoggerMiddleware(req: Request, res: Response, next: NextFunction) {
  const start = Date.now();

  res.on('finish', () => {
    logEntry({
      event: 'http_request',
      requestId: req.requestId,
      method: req.method,
      path: req.path,
      query: Object.keys(req.query).length > 0 ? req.query : undefined,
      status: res.statusCode,
      durationMs: Date.now() - start,
      bytesOut: Number(res.getHeader('content-length') ?? 0),
      timestamp: new Date().toISOString()
    });
  });

  next();
}
