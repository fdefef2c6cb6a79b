import bcrypt from 'bcrypt';
import { type UserModel, toPublicUser } from '../models/user.model.js';
import type { Role, User } from '../types/models.js';
import { ConflictError, InvalidCredentialsError } from '../utils/errors.js';

export class AuthService {
    constructor(
        private userModel: UserModel,
        private saltRounds: number
    ) {}

    async register(username: string, password: string, role: Role = 'consumer'): Promise<User> {
        const existing = await this.userModel.findRecordByUsername(username);
        if (existing) {
            throw new ConflictError(`Username "${username}" is already taken`);
        }

        const passwordHash = await bcrypt.hash(password, this.saltRounds);
        return this.userModel.create(username, passwordHash, role);
    }

    async login(username: string, password: string): Promise<User> {
        const record = await this.userModel.findRecordByUsername(username);
        if (!record) {
            // hash anyway so unknown usernames take as long as wrong passwords
            await bcrypt.hash(password, this.saltRounds);
            throw new InvalidCredentialsError();
        }

        const valid = await bcrypt.compare(password, record.password);
        if (!valid) {
            throw new InvalidCredentialsError();
        }
        return toPublicUser(record);
    }
}
