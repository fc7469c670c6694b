import type { FastifyInstance } from 'fastify';
import type { RouteOptions } from '@/types/services.js';
import type { Role } from '@/types/models.js';
import type { UserChanges } from '@/types/repositories.js';
import type { PageRequest } from '@/services/paginate.utils.js';
import { UserController } from '@/controllers/user.controller.js';
import { AdminController } from '@/controllers/admin.controller.js';
import authContext from '@/plugins/auth.context.js';
import {
    banUserSchema,
    getMeSchema,
    getUserSchema,
    listUserPhotosSchema,
    setRoleSchema,
    updateMeSchema,
} from './schemas/user.schema.js';

export async function userRoutes(app: FastifyInstance, { services }: RouteOptions) {
    const userController = new UserController(services.users, services.search);
    const adminController = new AdminController(services.users);

    // protected
    app.register(async function protectedUserRoutes(app) {
        app.register(authContext, { auth: services.auth });

        app.get('/users/me',
            { schema: getMeSchema },
            userController.getMe.bind(userController)
        );

        app.put<{ Body: UserChanges }>('/users/me',
            { schema: updateMeSchema },
            userController.updateMe.bind(userController)
        );

        app.get<{ Params: { username: string } }>('/users/:username',
            { schema: getUserSchema },
            userController.getByUsername.bind(userController)
        );

        app.get<{ Params: { userId: number }; Querystring: PageRequest }>('/users/:userId/photos',
            { schema: listUserPhotosSchema },
            userController.listPhotos.bind(userController)
        );

        // admin only: enforced by the policy in UserService
        app.put<{ Params: { identifier: string } }>('/admin/users/:identifier/ban',
            { schema: banUserSchema },
            adminController.ban.bind(adminController)
        );

        app.put<{ Params: { identifier: string } }>('/admin/users/:identifier/unban',
            { schema: banUserSchema },
            adminController.unban.bind(adminController)
        );

        app.put<{ Params: { identifier: string }; Body: { role: Role } }>('/admin/users/:identifier/role',
            { schema: setRoleSchema },
            adminController.setRole.bind(adminController)
        );
    });
}
