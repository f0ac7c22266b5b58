import { type RequestHandler } from 'express';
import { InvalidTokenError } from '@modelcontextprotocol/sdk/server/auth/errors.js';
import { requireBearerAuth } from '@modelcontextprotocol/sdk/server/auth/middleware/bearerAuth.js';
import { type OAuthTokenVerifier } from '@modelcontextprotocol/sdk/server/auth/provider.js';
import { type AuthMode } from './config.js';
import { ConfigurationError } from './errors.js';
import { logger } from './logger.js';

export interface AuthContext {
  mode: AuthMode
  middleware: RequestHandler | null
}

const TOKEN_LIFETIME_SECONDS = 24 * 60 * 60;

/** Accepts exactly the configured static token. */
export const createStaticTokenVerifier = (expected: string): OAuthTokenVerifier => ({
  verifyAccessToken: async (token: string) => {
    if (token !== expected) {
      throw new InvalidTokenError('Invalid token');
    }
    return {
      token,
      clientId: 'local-user',
      scopes: ['mcp:tools'],
      expiresAt: Math.floor(Date.now() / 1000) + TOKEN_LIFETIME_SECONDS
    };
  }
});

export const buildAuthContext = (settings: { mode: AuthMode, bearerToken?: string }): AuthContext => {
  switch (settings.mode) {
    case 'none': {
      logger.warn('MCP authentication disabled via MCP_AUTH_MODE=none.');
      return { mode: 'none', middleware: null };
    }
    case 'bearer': {
      const expected = settings.bearerToken;
      if (expected === undefined || expected === '') {
        throw new ConfigurationError('MCP_BEARER_TOKEN is required when MCP_AUTH_MODE=bearer. Set MCP_AUTH_MODE=none to disable auth.');
      }

      const middleware = requireBearerAuth({
        verifier: createStaticTokenVerifier(expected),
        requiredScopes: []
      });

      return { mode: 'bearer', middleware };
    }
  }
};
