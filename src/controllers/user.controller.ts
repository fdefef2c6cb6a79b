import type { FastifyReply, FastifyRequest } from 'fastify';
import type { PhotoModel } from '../models/photo.model.js';
import type { UserModel } from '../models/user.model.js';
import { endSession, startSession } from '../plugins/session.js';
import type { AuthService } from '../services/auth.service.js';
import { ROLES, type Role } from '../types/models.js';
import { NotFoundError } from '../utils/errors.js';

export interface RegisterBody {
    username: string;
    password: string;
    role?: Role;
}

export interface LoginBody {
    username: string;
    password: string;
}

export interface ProfileParams {
    username: string;
}

export class UserController {
    constructor(
        private authService: AuthService,
        private userModel: UserModel,
        private photoModel: PhotoModel
    ) {}

    // GET /
    async home(request: FastifyRequest, reply: FastifyReply) {
        return reply.redirect(request.user ? '/feed' : '/login');
    }

    // GET /register
    async registerForm(_request: FastifyRequest, reply: FastifyReply) {
        return reply.send({ roles: ROLES, default_role: 'consumer' });
    }

    // POST /register
    async register(request: FastifyRequest<{ Body: RegisterBody }>, reply: FastifyReply) {
        const { username, password, role } = request.body;

        const user = await this.authService.register(username, password, role ?? 'consumer');
        request.log.info({ user_id: user.id, role: user.role }, 'registered user');

        return reply.status(201).send({ user });
    }

    // GET /login
    async session(request: FastifyRequest, reply: FastifyReply) {
        return reply.send({ authenticated: request.user !== null, user: request.user });
    }

    // POST /login
    async login(request: FastifyRequest<{ Body: LoginBody }>, reply: FastifyReply) {
        const { username, password } = request.body;

        const user = await this.authService.login(username, password);
        startSession(reply, user);
        request.log.info({ user_id: user.id }, 'user logged in');

        return reply.send({ user });
    }

    // GET /logout
    async logout(_request: FastifyRequest, reply: FastifyReply) {
        endSession(reply);
        return reply.redirect('/login');
    }

    // GET /u/:username
    // three independent collections: a photo can show up in more than one
    async profile(request: FastifyRequest<{ Params: ProfileParams }>, reply: FastifyReply) {
        const user = await this.userModel.findByUsername(request.params.username);
        if (!user) {
            throw new NotFoundError(`User "${request.params.username}" not found`);
        }

        const [photos, saved_photos, liked_photos] = await Promise.all([
            this.photoModel.findByOwner(user.id),
            this.photoModel.findByRelation('saves', user.id),
            this.photoModel.findByRelation('likes', user.id),
        ]);

        return reply.send({ user, photos, saved_photos, liked_photos });
    }
}
