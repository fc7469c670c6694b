import type { User } from '@/types/models.js';
import { ForbiddenError } from '@/utils/errors.js';

/**========================================================================
 **                        AUTHORIZATION POLICY
 *? pure decision over (role, ownership, action); no I/O
 *? banned users never reach this point (rejected by the auth context)
 *========================================================================**/

export type Action =
    | 'photo:read'
    | 'photo:update'
    | 'photo:delete'
    | 'photo:transform'
    | 'comment:create'
    | 'comment:edit'
    | 'comment:delete'
    | 'rating:create'
    | 'rating:delete'
    | 'user:ban'
    | 'user:set-role';

export type Actor = Pick<User, 'id' | 'role'>;

// owner of the resource the action is applied to
export type PolicyTarget = {
    ownerId: number;
};

const OPEN_ACTIONS = new Set<Action>(['photo:read', 'comment:create', 'rating:create']);

const MODERATOR_ACTIONS = new Set<Action>(['photo:read', 'comment:delete', 'rating:delete']);

const OWNER_ACTIONS = new Set<Action>([
    'photo:update',
    'photo:delete',
    'photo:transform',
    'comment:edit',
    'comment:delete',
]);

function isOwner(actor: Actor, target?: PolicyTarget): boolean {
    return target !== undefined && target.ownerId === actor.id;
}

export function can(actor: Actor, action: Action, target?: PolicyTarget): boolean {
    // author only, whatever the role
    if (action === 'comment:edit') return isOwner(actor, target);

    if (actor.role === 'admin') return true;
    if (OPEN_ACTIONS.has(action)) return true;
    if (actor.role === 'moderator' && MODERATOR_ACTIONS.has(action)) return true;
    if (OWNER_ACTIONS.has(action)) return isOwner(actor, target);

    return false;
}

export function authorize(actor: Actor, action: Action, target?: PolicyTarget): void {
    if (!can(actor, action, target)) {
        throw new ForbiddenError();
    }
}
