import { RequestHandler } from 'express';

/**
 * Redirect plain HTTP requests to the same URL over HTTPS (302)
 *
 * req.secure reflects X-Forwarded-Proto only when 'trust proxy' is set,
 * so deployments behind a TLS-terminating proxy need TRUST_PROXY=true.
 */
export const forceHttps: RequestHandler = (req, res, next) => {
  if (req.secure) {
    next();
    return;
  }

  const host = req.get('host') ?? req.hostname;
  res.redirect(302, `https://${host}${req.originalUrl}`);
};
