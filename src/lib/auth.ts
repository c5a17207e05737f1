import type { NextRequest } from 'next/server';
import { jsonError } from './errors';

export type AuthMode = 'disabled' | 'dev_headers';

export type AuthRole = 'viewer' | 'editor' | 'admin';

export type AuthContext = {
  mode: AuthMode;
  user: string;
  role: AuthRole;
};

const ROLE_ORDER: Record<AuthRole, number> = {
  viewer: 0,
  editor: 1,
  admin: 2,
};

type Env = Record<string, string | undefined>;

export function parseAuthMode(value: string | undefined): AuthMode {
  return (value || '').trim() === 'disabled' ? 'disabled' : 'dev_headers';
}

function parseRole(value: string | null): AuthRole | null {
  const trimmed = (value || '').trim();
  if (trimmed === 'admin' || trimmed === 'editor' || trimmed === 'viewer') return trimmed;
  return null;
}

export function getAuthContext(request: NextRequest, env: Env = process.env): AuthContext {
  const mode = parseAuthMode(env.PIPELINE_AUTH_MODE);
  if (mode === 'disabled') {
    return { mode, user: 'system', role: 'admin' };
  }
  return {
    mode,
    user: (request.headers.get('x-dev-user') || '').trim(),
    role: parseRole(request.headers.get('x-dev-role')) || 'viewer',
  };
}

/** Null when the caller may proceed, otherwise the 401/403 response to return. */
export function requireRole(request: NextRequest, required: AuthRole, env: Env = process.env) {
  const auth = getAuthContext(request, env);
  if (auth.mode === 'disabled') return null;
  if (!auth.user) {
    return jsonError(401, 'UNAUTHENTICATED', 'Missing x-dev-user');
  }
  if (ROLE_ORDER[auth.role] < ROLE_ORDER[required]) {
    return jsonError(403, 'FORBIDDEN', `Requires role ${required}`);
  }
  return null;
}
