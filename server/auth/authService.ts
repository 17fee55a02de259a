import { createLogger } from "../config/logger.js";
import { UnauthorizedError } from "../errors.js";
import type { User, UserStore } from "../store/userStore.js";
import { hashPassword, verifyPassword } from "./passwords.js";
import type { IssuedToken, TokenService } from "./tokens.js";

const log = createLogger("auth");

export type RegisterInput = {
  username: string;
  email: string;
  password: string;
};

export class AuthService {
  constructor(
    private readonly users: UserStore,
    private readonly tokens: TokenService,
  ) {}

  async register(input: RegisterInput): Promise<User> {
    const passwordHash = await hashPassword(input.password);
    const user = await this.users.createUser({
      username: input.username,
      email: input.email,
      passwordHash,
    });
    log.info("user.registered", { userId: user.id });
    return user;
  }

  async login(email: string, password: string): Promise<IssuedToken> {
    const user = await this.users.findByEmail(email);
    if (!user || !(await verifyPassword(password, user.passwordHash))) {
      log.warn("login.rejected");
      throw new UnauthorizedError("Incorrect email or password");
    }
    await this.users.recordLogin(user.id);
    log.info("login.succeeded", { userId: user.id });
    return this.issueToken(user.id);
  }

  issueToken(userId: string): IssuedToken {
    return this.tokens.issue(userId);
  }

  /** Resolves the acting user; tokens of deleted users are rejected too. */
  async getCurrentUser(token: string): Promise<User> {
    const userId = this.tokens.verify(token);
    const user = await this.users.findById(userId);
    if (!user) {
      throw new UnauthorizedError("Could not validate credentials, user not found");
    }
    return user;
  }
}
