import type { Role, User, UserProfile } from '@/types/models.js';
import type { PhotoRepository, UserChanges, UserRepository } from '@/types/repositories.js';
import type { Actor } from './policy.js';
import { authorize } from './policy.js';
import { NotFoundError, ValidationError } from '@/utils/errors.js';
import { isIdString } from '@/utils/numbers.js';

export type OwnProfile = UserProfile & {
    photo_count: number;
};

// what other users may see: no email, no ban flag
export type PublicProfile = Pick<User, 'id' | 'username' | 'role' | 'created_at'> & {
    photo_count: number;
};

export function toUserProfile(user: User): UserProfile {
    const { password_hash: _password_hash, ...profile } = user;
    return profile;
}

export class UserService {
    constructor(
        private users: UserRepository,
        private photos: PhotoRepository
    ) {}

    async getProfile(user_id: number): Promise<OwnProfile> {
        const user = await this.requireUser(user_id);
        return {
            ...toUserProfile(user),
            photo_count: await this.photos.countByOwner(user.id),
        };
    }

    async updateProfile(user_id: number, changes: UserChanges): Promise<OwnProfile> {
        const updated = await this.users.update(user_id, changes);
        return {
            ...toUserProfile(updated),
            photo_count: await this.photos.countByOwner(updated.id),
        };
    }

    async getPublicProfile(username: string): Promise<PublicProfile> {
        const user = await this.users.findByUsername(username);
        if (!user) {
            throw new NotFoundError('USER_NOT_FOUND', 'User');
        }
        return {
            id: user.id,
            username: user.username,
            role: user.role,
            created_at: user.created_at,
            photo_count: await this.photos.countByOwner(user.id),
        };
    }

    /**========================================================================
     **                          ADMINISTRATION
     *? identifier is a numeric id or a username; digits that match
     *? no id are tried as a username
     *? admins cannot change their own status or role
     *========================================================================**/

    async resolve(identifier: string): Promise<User> {
        const byId = isIdString(identifier) ? await this.users.findById(Number(identifier)) : null;
        const user = byId ?? await this.users.findByUsername(identifier);

        if (!user) {
            throw new NotFoundError('USER_NOT_FOUND', 'User');
        }
        return user;
    }

    async setBanned(actor: Actor, identifier: string, banned: boolean): Promise<UserProfile> {
        authorize(actor, 'user:ban');

        const target = await this.resolveOther(actor, identifier);
        return toUserProfile(await this.users.setBanned(target.id, banned));
    }

    async setRole(actor: Actor, identifier: string, role: Role): Promise<UserProfile> {
        authorize(actor, 'user:set-role');

        const target = await this.resolveOther(actor, identifier);
        return toUserProfile(await this.users.setRole(target.id, role));
    }

    private async resolveOther(actor: Actor, identifier: string): Promise<User> {
        const target = await this.resolve(identifier);
        if (target.id === actor.id) {
            throw new ValidationError('SELF_STATUS_CHANGE', 'You cannot change your own status or role');
        }
        return target;
    }

    private async requireUser(user_id: number): Promise<User> {
        const user = await this.users.findById(user_id);
        if (!user) {
            throw new NotFoundError('USER_NOT_FOUND', 'User');
        }
        return user;
    }
}
