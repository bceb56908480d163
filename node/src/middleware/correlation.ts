// Correlation id shared by HTTP logs and pipeline runs
import { Request, Response, NextFunction } from 'express';
import { randomUUID } from 'crypto';

type CorrelatedRequest = Request & { correlationId?: string };

export function attachCorrelationId(
  req: Request,
  res: Response,
  next: NextFunction,
): void {
  const headerId = req.header('x-correlation-id')?.trim();
  const correlationId = headerId && headerId.length <= 128 ? headerId : randomUUID();

  (req as CorrelatedRequest).correlationId = correlationId;
  res.setHeader('x-correlation-id', correlationId);
  next();
}

export function getCorrelationId(req: Request): string | undefined {
  return (req as CorrelatedRequest).correlationId;
}
