import type { Cookie } from './types';

/**
 * Per-host cookie jar shared by every worker of a run.
 *
 * Every operation runs to completion synchronously, so concurrent async
 * workers on the event loop never observe a half-applied update.
 * Cookies live only as long as the process; a file-backed jar can
 * implement the same interface.
 */
export interface SessionStore {
  setCookie(host: string, cookie: Cookie): void;
  getCookies(host: string): Cookie[];
  clear(host: string): void;
  clearAll(): void;
  hosts(): string[];
}

export class MemorySessionStore implements SessionStore {
  private cookies = new Map<string, Cookie[]>();

  setCookie(host: string, cookie: Cookie): void {
    const jar = this.cookies.get(host) ?? [];
    const idx = jar.findIndex((c) => c.name === cookie.name);
    if (idx >= 0) {
      jar[idx] = { ...cookie };
    } else {
      jar.push({ ...cookie });
    }
    this.cookies.set(host, jar);
  }

  getCookies(host: string): Cookie[] {
    return (this.cookies.get(host) ?? []).map((c) => ({ ...c }));
  }

  clear(host: string): void {
    this.cookies.delete(host);
  }

  clearAll(): void {
    this.cookies.clear();
  }

  hosts(): string[] {
    return [...this.cookies.keys()];
  }
}

/** Parse one `Set-Cookie` header value. Returns null when there is no name. */
export function parseSetCookie(header: string): Cookie | null {
  const [pair, ...attributes] = header.split(';');
  const eq = pair.indexOf('=');
  if (eq <= 0) return null;

  const cookie: Cookie = {
    name: pair.slice(0, eq).trim(),
    value: pair.slice(eq + 1).trim(),
  };
  if (!cookie.name) return null;

  for (const attr of attributes) {
    const [rawKey, ...rest] = attr.split('=');
    const key = rawKey.trim().toLowerCase();
    const value = rest.join('=').trim();
    switch (key) {
      case 'path':
        cookie.path = value;
        break;
      case 'domain':
        cookie.domain = value;
        break;
      case 'expires':
        cookie.expires = value;
        break;
      case 'max-age': {
        const maxAge = Number.parseInt(value, 10);
        if (Number.isFinite(maxAge)) cookie.maxAge = maxAge;
        break;
      }
      case 'secure':
        cookie.secure = true;
        break;
      case 'httponly':
        cookie.httpOnly = true;
        break;
      case 'samesite':
        cookie.sameSite = value;
        break;
      default:
        break;
    }
  }
  return cookie;
}

/** Render cookies as a `Cookie` request header value. */
export function formatCookieHeader(cookies: Cookie[]): string {
  return cookies.map((c) => `${c.name}=${c.value}`).join('; ');
}
