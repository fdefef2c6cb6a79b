import type { FastifyInstance } from 'fastify';
import { UserModel } from '../models/user.model.js';
import { PhotoModel } from '../models/photo.model.js';
import { AuthService } from '../services/auth.service.js';
import {
    type LoginBody,
    type ProfileParams,
    type RegisterBody,
    UserController,
} from '../controllers/user.controller.js';
import userContext from '../plugins/user.context.js';
import {
    loginSchema,
    profileSchema,
    registerFormSchema,
    registerSchema,
    sessionSchema,
} from './schemas/user.schema.js';

export async function userRoutes(app: FastifyInstance) {
    const userModel = new UserModel(app.db);
    const userController = new UserController(
        new AuthService(userModel, app.config.bcryptRounds),
        userModel,
        new PhotoModel(app.db)
    );

    // public
    app.get('/', { schema: { hide: true } }, userController.home.bind(userController));

    app.get('/register',
        { schema: registerFormSchema },
        userController.registerForm.bind(userController)
    );

    app.post<{ Body: RegisterBody }>('/register',
        { schema: registerSchema },
        userController.register.bind(userController)
    );

    app.get('/login',
        { schema: sessionSchema },
        userController.session.bind(userController)
    );

    app.post<{ Body: LoginBody }>('/login',
        { schema: loginSchema },
        userController.login.bind(userController)
    );

    // protected
    app.register(async function protectedUserRoutes(app) {
        app.register(userContext);

        app.get('/logout', userController.logout.bind(userController));

        app.get<{ Params: ProfileParams }>(
            '/u/:username',
            { schema: profileSchema },
            userController.profile.bind(userController)
        );
    });
}
