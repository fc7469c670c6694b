import type { FastifyInstance } from 'fastify';
import type { RouteOptions } from '@/types/services.js';
import type { SignupInput } from '@/services/auth.service.js';
import { AuthController } from '@/controllers/auth.controller.js';
import authContext from '@/plugins/auth.context.js';
import { loginSchema, logoutSchema, refreshSchema, signupSchema } from './schemas/auth.schema.js';

export async function authRoutes(app: FastifyInstance, { services }: RouteOptions) {
    const authController = new AuthController(services.auth);

    // public
    app.post<{ Body: SignupInput }>('/auth/signup',
        { schema: signupSchema },
        authController.signup.bind(authController)
    );

    app.post<{ Body: { email: string; password: string } }>('/auth/login',
        { schema: loginSchema },
        authController.login.bind(authController)
    );

    app.post<{ Body: { refresh_token: string } }>('/auth/refresh',
        { schema: refreshSchema },
        authController.refresh.bind(authController)
    );

    // protected
    app.register(async function protectedAuthRoutes(app) {
        app.register(authContext, { auth: services.auth });

        app.post<{ Body: { refresh_token?: unknown } | undefined }>('/auth/logout',
            { schema: logoutSchema },
            authController.logout.bind(authController)
        );
    });
}
