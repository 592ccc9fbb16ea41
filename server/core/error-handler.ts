import type { Request, Response, NextFunction } from "express";

function statusOf(err: unknown): number {
  if (typeof err === "object" && err !== null) {
    if ("status" in err && typeof err.status === "number" && err.status) return err.status;
    if ("statusCode" in err && typeof err.statusCode === "number" && err.statusCode) return err.statusCode;
  }
  return 500;
}

function messageOf(err: unknown): string {
  if (typeof err === "object" && err !== null && "message" in err && typeof err.message === "string" && err.message) {
    return err.message;
  }
  return "Internal Server Error";
}

/**
 * Letzte Express-Middleware: `{ message }` mit status/statusCode oder 500, nie Stack-Traces.
 */
export function errorHandler(err: unknown, _req: Request, res: Response, _next: NextFunction): void {
  res.status(statusOf(err)).json({ message: messageOf(err) });
}
