import helmet from 'helmet';

/**
 * Security headers for a JSON-only API: nothing is rendered, so no content
 * may load and no page may frame a response.
 */
class SecurityHeadersManager {
  private static instance: SecurityHeadersManager;

  private constructor() {}

  public static getInstance(): SecurityHeadersManager {
    if (!SecurityHeadersManager.instance) {
      SecurityHeadersManager.instance = new SecurityHeadersManager();
    }
    return SecurityHeadersManager.instance;
  }

  public getSecurityConfig(production: boolean = process.env.NODE_ENV === 'production') {
    const directives: Record<string, string[]> = {
      defaultSrc: ["'none'"],
      frameAncestors: ["'none'"],
      baseUri: ["'none'"],
      formAction: ["'none'"],
    };
    if (production) {
      directives.upgradeInsecureRequests = [];
    }

    return helmet({
      contentSecurityPolicy: { useDefaults: false, directives },
      crossOriginResourcePolicy: { policy: 'same-origin' },
      frameguard: { action: 'deny' },
      hsts: {
        maxAge: 15552000, // 180 days
        includeSubDomains: true,
        preload: production,
      },
      referrerPolicy: { policy: 'no-referrer' },
    });
  }
}

export const securityHeadersManager = SecurityHeadersManager.getInstance();
