import { Request, Response, NextFunction } from "express";
import { generateCorrelationId } from "@/utils/idGenerator";
import "@/types/express";

export const CORRELATION_ID_HEADER = "x-correlation-id";

export const correlationIdMiddleware = (
  req: Request,
  res: Response,
  next: NextFunction
) => {
  const incoming = req.header(CORRELATION_ID_HEADER);
  req.correlationId =
    incoming && incoming.trim().length > 0 ? incoming : generateCorrelationId();
  res.setHeader(CORRELATION_ID_HEADER, req.correlationId);
  next();
};
