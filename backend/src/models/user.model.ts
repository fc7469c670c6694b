import type { Pool } from 'pg';
import type { Role, User } from '@/types/models.js';
import type { NewUser, UserChanges, UserRepository } from '@/types/repositories.js';
import { isUniqueViolation } from '@/database/errors.js';
import { withTransaction } from '@/database/transaction.js';
import { ConflictError, NotFoundError } from '@/utils/errors.js';

const USER_COLUMNS = 'id, username, email, password_hash, role, banned, created_at, updated_at';

// map unique violations on users to the matching 409
function toConflict(err: unknown): unknown {
    if (isUniqueViolation(err, 'users_username_key')) {
        return new ConflictError('USERNAME_TAKEN', 'User with this username already exists');
    }
    if (isUniqueViolation(err, 'users_email_key')) {
        return new ConflictError('EMAIL_TAKEN', 'User with this email already exists');
    }
    return err;
}

export class UserModel implements UserRepository {
    constructor(private db: Pool) {}

    // the table lock serializes concurrent signups so only one can see it empty
    async createFirstAdminOrUser(data: NewUser): Promise<User> {
        const query = `
            INSERT INTO users (username, email, password_hash, role)
            SELECT $1, $2, $3,
                   CASE WHEN EXISTS (SELECT 1 FROM users) THEN 'user' ELSE 'admin' END
            RETURNING ${USER_COLUMNS}
        `;
        const values = [data.username, data.email, data.password_hash];

        try {
            return await withTransaction(this.db, async (client) => {
                await client.query('LOCK TABLE users IN SHARE ROW EXCLUSIVE MODE');
                const result = await client.query<User>(query, values);
                const user = result.rows[0];
                if (!user) {
                    throw new Error('User INSERT failed');
                }
                return user;
            });
        } catch (err) {
            throw toConflict(err);
        }
    }

    async findById(id: number): Promise<User | null> {
        const result = await this.db.query<User>(
            `SELECT ${USER_COLUMNS} FROM users WHERE id = $1`,
            [id]
        );
        return result.rows[0] ?? null;
    }

    async findByEmail(email: string): Promise<User | null> {
        const result = await this.db.query<User>(
            `SELECT ${USER_COLUMNS} FROM users WHERE email = $1`,
            [email]
        );
        return result.rows[0] ?? null;
    }

    async findByUsername(username: string): Promise<User | null> {
        const result = await this.db.query<User>(
            `SELECT ${USER_COLUMNS} FROM users WHERE username = $1`,
            [username]
        );
        return result.rows[0] ?? null;
    }

    // only columns present in changes are touched
    async update(id: number, changes: UserChanges): Promise<User> {
        const query = `
            UPDATE users
            SET username = COALESCE($2, username),
                email = COALESCE($3, email),
                updated_at = now()
            WHERE id = $1
            RETURNING ${USER_COLUMNS}
        `;
        const values = [id, changes.username ?? null, changes.email ?? null];

        try {
            return this.requireRow(await this.db.query<User>(query, values));
        } catch (err) {
            throw toConflict(err);
        }
    }

    async setBanned(id: number, banned: boolean): Promise<User> {
        const result = await this.db.query<User>(
            `UPDATE users SET banned = $2, updated_at = now() WHERE id = $1 RETURNING ${USER_COLUMNS}`,
            [id, banned]
        );
        return this.requireRow(result);
    }

    async setRole(id: number, role: Role): Promise<User> {
        const result = await this.db.query<User>(
            `UPDATE users SET role = $2, updated_at = now() WHERE id = $1 RETURNING ${USER_COLUMNS}`,
            [id, role]
        );
        return this.requireRow(result);
    }

    private requireRow(result: { rows: User[] }): User {
        const user = result.rows[0];
        if (!user) {
            throw new NotFoundError('USER_NOT_FOUND', 'User');
        }
        return user;
    }
}
