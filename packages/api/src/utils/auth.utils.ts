import jwt from 'jsonwebtoken';

export interface JWTPayload {
  userId: string;
  email?: string;
}

export function generateJWT(payload: JWTPayload, secret: string, expiresInSeconds = 24 * 60 * 60): string {
  return jwt.sign(payload, secret, { expiresIn: expiresInSeconds });
}

/** Returns the payload of a valid token, or undefined when it is malformed, expired or signed with another secret. */
export function verifyJWT(token: string, secret: string): JWTPayload | undefined {
  try {
    const decoded = jwt.verify(token, secret);
    if (typeof decoded !== 'object' || typeof decoded.userId !== 'string') {
      return undefined;
    }
    return {
      userId: decoded.userId,
      email: typeof decoded.email === 'string' ? decoded.email : undefined
    };
  } catch (error) {
    if (error instanceof jwt.JsonWebTokenError) {
      return undefined;
    }
    throw error;
  }
}
