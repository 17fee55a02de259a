import jwt, { type JwtPayload } from "jsonwebtoken";
import { UnauthorizedError } from "../errors.js";

export type IssuedToken = {
  accessToken: string;
  expiresIn: number;
};

export class TokenService {
  private readonly ttlSeconds: number;

  constructor(
    private readonly secret: string,
    ttlMinutes: number,
  ) {
    this.ttlSeconds = ttlMinutes * 60;
  }

  issue(userId: string): IssuedToken {
    const accessToken = jwt.sign({}, this.secret, {
      algorithm: "HS256",
      subject: userId,
      expiresIn: this.ttlSeconds,
    });
    return { accessToken, expiresIn: this.ttlSeconds };
  }

  /** Returns the user id carried by a valid, unexpired token. */
  verify(token: string): string {
    let payload: string | JwtPayload;
    try {
      payload = jwt.verify(token, this.secret, { algorithms: ["HS256"] });
    } catch (err) {
      if (err instanceof jwt.TokenExpiredError) {
        throw new UnauthorizedError("Token has expired");
      }
      throw new UnauthorizedError();
    }
    if (typeof payload === "string" || !payload.sub) {
      throw new UnauthorizedError();
    }
    return payload.sub;
  }
}
