import os from 'os';
import path from 'path';
import sharp from 'sharp';
import { expect } from 'chai';
import type { FastifyInstance } from 'fastify';
import { buildApp, type AppOverrides } from '../src/app.js';
import type { AppConfig } from '../src/config.js';
import { readNumber } from '../src/db/rows.js';
import type { BlobSink } from '../src/services/blob.storage.js';

// shared helpers: every suite gets its own app on an in-memory sqlite db

export const TEST_PASSWORD = 'test-password';

export interface StoredBlob {
    name: string;
    bytes: Buffer;
    contentType: string;
}

// records writes instead of touching disk or the cloud
export class MemoryBlobSink implements BlobSink {
    writes: StoredBlob[] = [];

    async write(name: string, bytes: Buffer, contentType: string): Promise<string> {
        this.writes.push({ name, bytes, contentType });
        return `memory://uploads/${name}`;
    }
}

export function testConfig(): AppConfig {
    return {
        port: 0,
        host: '127.0.0.1',
        logLevel: 'silent',
        secretKey: 'test-secret',
        bcryptRounds: 4,
        database: { kind: 'sqlite', filename: ':memory:' },
        storage: { kind: 'local', directory: path.join(os.tmpdir(), 'lensloft-test-uploads') },
    };
}

// one minute later on every call, starting 2024-01-02T03:04:05Z
export function steppingClock(start = Date.UTC(2024, 0, 2, 3, 4, 5)): () => Date {
    let tick = 0;
    return () => new Date(start + 60_000 * tick++);
}

export async function buildTestApp(overrides: AppOverrides = {}) {
    const blobSink = new MemoryBlobSink();
    const app = await buildApp(testConfig(), {}, { blobSink, clock: steppingClock(), ...overrides });
    await app.ready();
    return { app, blobSink };
}

export interface TestSession {
    user: { id: number; username: string; role: string };
    cookies: Record<string, string>;
}

export async function registerAndLogin(
    app: FastifyInstance,
    username: string,
    role: 'creator' | 'consumer' = 'consumer'
): Promise<TestSession> {
    const registered = await app.inject({
        method: 'POST',
        url: '/register',
        payload: { username, password: TEST_PASSWORD, role },
    });
    expect(registered.statusCode).to.equal(201);

    const login = await app.inject({
        method: 'POST',
        url: '/login',
        payload: { username, password: TEST_PASSWORD },
    });
    expect(login.statusCode).to.equal(200);

    const session = login.cookies.find(cookie => cookie.name === 'session');
    expect(session, 'session cookie').to.not.equal(undefined);

    const body: { user: TestSession['user'] } = registered.json();
    return { user: body.user, cookies: { session: session?.value ?? '' } };
}

export async function countRows(app: FastifyInstance, table: string): Promise<number> {
    const rows = await app.db.query(`SELECT CAST(COUNT(*) AS INTEGER) AS total FROM ${table}`);
    return readNumber(rows[0], 'total');
}

export interface Colour {
    r: number;
    g: number;
    b: number;
}

// lossless so decoded pixels equal the requested colour
export function solidPng(width: number, height: number, background: Colour): Promise<Buffer> {
    return sharp({ create: { width, height, channels: 3, background } }).png().toBuffer();
}
