import type { Request, Response, NextFunction, RequestHandler } from "express";
import { ZodError } from "zod";
import { HttpError, NotFoundError } from "../errors.js";

/** Status carried by an error thrown from our code or from express itself */
function statusOf(err: Error): number {
  if (err instanceof HttpError) return err.status;
  if ("status" in err && typeof err.status === "number") return err.status;
  return 500;
}

export function errorHandler(
  err: unknown,
  _req: Request,
  res: Response,
  next: NextFunction,
): void {
  if (err instanceof ZodError) {
    console.warn(`[validation] ${JSON.stringify(err.issues)}`);
    res.status(422).json({
      message: "Validation failed",
      details: err.issues,
    });
    return;
  }

  if (err instanceof Error) {
    const status = statusOf(err);
    if (status >= 500) {
      console.error(`[error] ${err.stack ?? err.message}`);
    } else {
      console.warn(`[error] ${status} ${err.message}`);
    }
    res.status(status).json({ message: err.message });
    return;
  }

  next(err);
}

/** Fallback for requests no route matched */
export function notFoundHandler(req: Request, _res: Response, next: NextFunction): void {
  next(new NotFoundError(`Cannot ${req.method} ${req.path}`));
}

/** Forward rejections from async handlers to the error middleware */
export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<void>,
): RequestHandler {
  return (req, res, next) => {
    fn(req, res, next).catch(next);
  };
}
