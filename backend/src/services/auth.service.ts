import { randomUUID } from 'crypto';
import bcrypt from 'bcryptjs';
import { SignJWT, errors, jwtVerify } from 'jose';
import type { JWTPayload } from 'jose';
import type { User } from '@/types/models.js';
import type { UserRepository } from '@/types/repositories.js';
import type { TokenBlacklist } from './token.blacklist.js';
import { AuthError, ForbiddenError } from '@/utils/errors.js';

export type TokenType = 'access' | 'refresh';

export type TokenPair = {
    access_token: string;
    refresh_token: string;
    token_type: 'bearer';
};

export type SignupInput = {
    username: string;
    email: string;
    password: string;
};

export type AuthOptions = {
    secret: string;
    accessTtlMinutes: number;
    refreshTtlDays: number;
    bcryptRounds: number;
    // epoch ms; injectable for expiry tests
    now?: () => number;
};

type VerifiedToken = {
    userId: number;
    jti: string;
    expiresAt: Date;
};

export class AuthService {
    private key: Uint8Array;
    private now: () => number;

    constructor(
        private users: UserRepository,
        private blacklist: TokenBlacklist,
        private options: AuthOptions
    ) {
        this.key = new TextEncoder().encode(options.secret);
        this.now = options.now ?? Date.now;
    }

    /**========================================================================
     **                              ACCOUNTS
     *========================================================================**/

    // the very first account administers the instance
    async signup(input: SignupInput): Promise<User> {
        const password_hash = await bcrypt.hash(input.password, this.options.bcryptRounds);

        return this.users.createFirstAdminOrUser({
            username: input.username,
            email: input.email,
            password_hash,
        });
    }

    async login(email: string, password: string): Promise<TokenPair> {
        const user = await this.users.findByEmail(email);
        if (!user || !(await bcrypt.compare(password, user.password_hash))) {
            throw new AuthError('INVALID_CREDENTIALS', 'Incorrect email or password');
        }
        if (user.banned) {
            throw new ForbiddenError('USER_BANNED', 'User is banned');
        }
        return this.issueTokens(user.id);
    }

    // rotate: the presented refresh token cannot be used again
    async refresh(refreshToken: string): Promise<TokenPair> {
        const verified = await this.verify(refreshToken, 'refresh');
        const user = await this.loadActiveUser(verified.userId);

        await this.blacklist.revoke(verified.jti, verified.expiresAt);
        return this.issueTokens(user.id);
    }

    async logout(accessToken: string, refreshToken?: string): Promise<void> {
        const access = await this.verify(accessToken, 'access');

        // both tokens are checked before either is revoked
        let refresh: VerifiedToken | undefined;
        if (refreshToken !== undefined) {
            refresh = await this.verify(refreshToken, 'refresh', { checkRevoked: false });
            if (refresh.userId !== access.userId) {
                throw new AuthError('INVALID_TOKEN', 'Refresh token belongs to another user');
            }
        }

        await this.blacklist.revoke(access.jti, access.expiresAt);
        if (refresh) {
            await this.blacklist.revoke(refresh.jti, refresh.expiresAt);
        }
    }

    // signature -> expiry -> type -> blacklist -> user -> ban
    async authenticate(token: string): Promise<User> {
        const verified = await this.verify(token, 'access');
        return this.loadActiveUser(verified.userId);
    }

    /**========================================================================
     **                              TOKENS
     *========================================================================**/

    private async issueTokens(userId: number): Promise<TokenPair> {
        const [access_token, refresh_token] = await Promise.all([
            this.sign(userId, 'access', this.options.accessTtlMinutes * 60),
            this.sign(userId, 'refresh', this.options.refreshTtlDays * 24 * 60 * 60),
        ]);
        return { access_token, refresh_token, token_type: 'bearer' };
    }

    async sign(userId: number, type: TokenType, ttlSeconds: number): Promise<string> {
        const issuedAt = Math.floor(this.now() / 1000);

        return new SignJWT({ type })
            .setProtectedHeader({ alg: 'HS256' })
            .setSubject(String(userId))
            .setJti(randomUUID())
            .setIssuedAt(issuedAt)
            .setExpirationTime(issuedAt + ttlSeconds)
            .sign(this.key);
    }

    private async verify(
        token: string,
        expected: TokenType,
        { checkRevoked = true }: { checkRevoked?: boolean } = {}
    ): Promise<VerifiedToken> {
        let payload: JWTPayload;
        try {
            ({ payload } = await jwtVerify(token, this.key, {
                algorithms: ['HS256'],
                currentDate: new Date(this.now()),
            }));
        } catch (err) {
            if (err instanceof errors.JWTExpired) {
                throw new AuthError('TOKEN_EXPIRED', 'Token has expired');
            }
            if (err instanceof errors.JOSEError) {
                throw new AuthError('INVALID_TOKEN');
            }
            throw err;
        }

        const userId = Number(payload.sub);
        if (!Number.isInteger(userId) || typeof payload.jti !== 'string' || typeof payload.exp !== 'number') {
            throw new AuthError('INVALID_TOKEN');
        }
        if (payload.type !== expected) {
            throw new AuthError('INVALID_TOKEN', `Expected ${expected} token`);
        }
        if (checkRevoked && await this.blacklist.isRevoked(payload.jti)) {
            throw new AuthError('TOKEN_REVOKED', 'Token has been revoked');
        }

        return {
            userId,
            jti: payload.jti,
            expiresAt: new Date(payload.exp * 1000),
        };
    }

    private async loadActiveUser(userId: number): Promise<User> {
        const user = await this.users.findById(userId);
        if (!user) {
            throw new AuthError('INVALID_TOKEN', 'User no longer exists');
        }
        if (user.banned) {
            throw new ForbiddenError('USER_BANNED', 'User is banned');
        }
        return user;
    }
}
