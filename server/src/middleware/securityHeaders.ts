import helmet from 'helmet';

/**
 * Helmet configured for a JSON API: nothing may be loaded or framed.
 * HSTS is only sent in production.
 */
export function createSecurityHeaders(nodeEnv: string) {
  const isProduction = nodeEnv === 'production';
  return helmet({
    contentSecurityPolicy: {
      useDefaults: false,
      directives: {
        defaultSrc: ["'none'"],
        frameAncestors: ["'none'"],
        baseUri: ["'none'"],
        formAction: ["'none'"],
      },
    },
    frameguard: { action: 'deny' },
    crossOriginEmbedderPolicy: false,
    hsts: isProduction ? { maxAge: 31536000, includeSubDomains: true } : false,
  });
}
