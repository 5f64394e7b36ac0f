import type { Request, Response, NextFunction, RequestHandler } from 'express';

type AsyncRequestHandler<P, ReqBody> = (
  req: Request<P, unknown, ReqBody>,
  res: Response,
  next: NextFunction
) => Promise<void>;

/**
 * Express 4 does not observe returned promises; forward rejections to the
 * error handler instead of leaving them unhandled.
 */
export function asyncHandler<P = Record<string, string>, ReqBody = unknown>(
  handler: AsyncRequestHandler<P, ReqBody>
): RequestHandler<P, unknown, ReqBody> {
  return (req, res, next): void => {
    handler(req, res, next).catch(next);
  };
}
