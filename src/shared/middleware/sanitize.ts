import { HTTPException } from 'hono/http-exception';

/** Alphanumerics, hyphens, underscores and the class separator ':' */
const SAFE_ID = /^[a-zA-Z0-9_:-]{1,128}$/;

export function sanitizeId(value: string | undefined, field: string): string {
  if (!value) {
    throw new HTTPException(400, { message: `${field} cannot be empty` });
  }
  if (!SAFE_ID.test(value)) {
    throw new HTTPException(400, {
      message: `Invalid ${field}: only alphanumeric characters, hyphens, underscores and colons are allowed`,
    });
  }
  return value;
}
