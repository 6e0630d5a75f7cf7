import { describe, it, expect, beforeAll, afterAll, vi } from 'vitest';

vi.mock('../../server/db', async () => {
  const { createTestDb } = await import('../helpers/testDb');
  return createTestDb();
});

vi.mock('../../server/core/logger', async (importOriginal) => ({
  ...(await importOriginal<typeof import('../../server/core/logger')>()),
  logger: {
    info: vi.fn(),
    error: vi.fn(),
    warn: vi.fn()
  }
}));

import type { Server } from 'http';
import { db } from '../../server/db';
import { config } from '../../server/core/config';
import { createApp } from '../../server/app';
import { clearAllCaches } from '../../server/core/queryCache';
import { resetDatabase, seedTestCatalog } from '../helpers/testDb';

let server: Server;
let baseUrl: string;

interface ApiResponse {
  status: number;
  body: Record<string, unknown>;
  cookie: string | null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

class ApiClient {
  private cookie: string | null = null;

  async request(method: string, path: string, body?: unknown, rawBody?: string): Promise<ApiResponse> {
    const headers: Record<string, string> = {};
    if (body !== undefined || rawBody !== undefined) headers['Content-Type'] = 'application/json';
    if (this.cookie) headers['Cookie'] = this.cookie;

    const response = await fetch(`${baseUrl}${path}`, {
      method,
      headers,
      body: rawBody ?? (body === undefined ? undefined : JSON.stringify(body)),
    });
    const setCookie = response.headers.get('set-cookie');
    if (setCookie) {
      this.cookie = setCookie.split(';')[0];
    }
    const text = await response.text();
    const parsed: unknown = text ? JSON.parse(text) : {};
    return {
      status: response.status,
      body: isRecord(parsed) ? parsed : {},
      cookie: this.cookie,
    };
  }

  get(path: string) { return this.request('GET', path); }
  post(path: string, body?: unknown) { return this.request('POST', path, body ?? {}); }
  put(path: string, body: unknown) { return this.request('PUT', path, body); }
  delete(path: string) { return this.request('DELETE', path); }
}

function nextOpenDate(): string {
  const date = new Date();
  date.setDate(date.getDate() + 2);
  while (date.getDay() === 0) {
    date.setDate(date.getDate() + 1);
  }
  const mm = String(date.getMonth() + 1).padStart(2, '0');
  const dd = String(date.getDate()).padStart(2, '0');
  return `${date.getFullYear()}-${mm}-${dd}`;
}

async function registerClient(username: string, email: string): Promise<ApiClient> {
  const client = new ApiClient();
  const res = await client.post('/api/auth/register', {
    username,
    email,
    password: 'test-password',
    fullName: `${username} Example`,
  });
  expect(res.status).toBe(201);
  return client;
}

describe('HTTP API', () => {
  beforeAll(async () => {
    config.databaseUrl = undefined;
    config.sessionSecret = 'test-secret';
    config.weather.apiKey = undefined;
    config.adminEmails = ['admin@example.test'];
    await resetDatabase(db);
    clearAllCaches();
    await seedTestCatalog(db);

    server = createApp().listen(0);
    await new Promise<void>(resolve => server.once('listening', () => resolve()));
    const address = server.address();
    if (!address || typeof address === 'string') throw new Error('server is not listening on a port');
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterAll(async () => {
    await new Promise<void>(resolve => server.close(() => resolve()));
  });

  it('reports health', async () => {
    const res = await new ApiClient().get('/api/health');

    expect(res.status).toBe(200);
    expect(res.body.status).toBe('ok');
  });

  it('lists only active catalog entries', async () => {
    const client = new ApiClient();

    const servicesRes = await client.get('/api/services');
    const productsRes = await client.get('/api/products');

    expect(servicesRes.status).toBe(200);
    expect(servicesRes.body.services).toEqual([
      expect.objectContaining({ id: 1, name: 'Lawn Mowing', priceCents: 5000 }),
      expect.objectContaining({ id: 2, name: 'Aeration', priceCents: 10000 }),
    ]);
    expect(productsRes.body.products).toEqual([
      expect.objectContaining({ id: 1, rating: 4.8, features: ['Pet Safe'] }),
      expect.objectContaining({ id: 2, rating: null, features: [] }),
    ]);
  });

  it('requires a session for customer routes', async () => {
    const client = new ApiClient();

    for (const path of ['/api/bookings', '/api/rewards', '/api/stats', '/api/profile', '/api/weather']) {
      const res = await client.get(path);
      expect(res.status).toBe(401);
    }
    const session = await client.get('/api/auth/session');
    expect(session.body).toEqual({ authenticated: false });
  });

  it('validates registration input and refuses duplicates', async () => {
    await registerClient('ivy', 'ivy@example.test');
    const client = new ApiClient();

    const invalid = await client.post('/api/auth/register', {
      username: 'iv',
      email: 'ivy2@example.test',
      password: 'test-password',
      fullName: 'Ivy Two',
    });
    const duplicate = await client.post('/api/auth/register', {
      username: 'ivy-two',
      email: 'IVY@example.test',
      password: 'test-password',
      fullName: 'Ivy Two',
    });

    expect(invalid.status).toBe(400);
    expect(invalid.body).toMatchObject({ code: 'VALIDATION_ERROR', field: 'username' });
    expect(duplicate.status).toBe(409);
    expect(duplicate.body).toMatchObject({ code: 'DUPLICATE_ACCOUNT', field: 'email' });
  });

  it('logs in, reports the session and logs out', async () => {
    await registerClient('jack', 'jack@example.test');
    const client = new ApiClient();

    const wrong = await client.post('/api/auth/login', { email: 'jack@example.test', password: 'wrong-password' });
    expect(wrong.status).toBe(401);
    expect(wrong.body.code).toBe('INVALID_CREDENTIALS');

    const login = await client.post('/api/auth/login', { email: 'jack@example.test', password: 'test-password' });
    expect(login.status).toBe(200);

    const session = await client.get('/api/auth/session');
    expect(session.body).toMatchObject({ authenticated: true, isAdmin: false, seeds: 500 });

    const profile = await client.put('/api/profile', { phone: '555-0199' });
    expect(profile.status).toBe(200);
    expect(profile.body.profile).toMatchObject({ username: 'jack', phone: '555-0199' });

    expect((await client.post('/api/auth/logout')).status).toBe(200);
    expect((await client.get('/api/profile')).status).toBe(401);
  });

  it('books through the wizard and moves seeds through the booking lifecycle', async () => {
    const customer = await registerClient('kate', 'kate@example.test');
    const admin = await registerClient('admin', 'admin@example.test');
    const date = nextOpenDate();

    expect((await customer.get('/api/booking/wizard')).status).toBe(404);

    const started = await customer.post('/api/booking/wizard');
    expect(started.status).toBe(201);
    expect(started.body.wizard).toMatchObject({ step: 1, stepName: 'service' });

    const step1 = await customer.put('/api/booking/wizard/steps/1', { serviceId: 1 });
    expect(step1.body.wizard).toMatchObject({ step: 2, stepName: 'products' });

    const step2 = await customer.put('/api/booking/wizard/steps/2', { products: [{ productId: 1, quantity: 1 }] });
    expect(step2.body.wizard).toMatchObject({ step: 3, totals: { totalPriceCents: 7999 } });

    const malformed = await customer.put('/api/booking/wizard/steps/3', { scheduledDate: 'next-week', scheduledTime: '10:00' });
    expect(malformed.status).toBe(400);
    expect(malformed.body).toMatchObject({ code: 'VALIDATION_ERROR', field: 'scheduledDate' });

    const step3 = await customer.put('/api/booking/wizard/steps/3', { scheduledDate: date, scheduledTime: '10:00' });
    expect(step3.status).toBe(200);
    expect(step3.body.wizard).toMatchObject({ step: 4, stepName: 'confirm' });

    const back = await customer.post('/api/booking/wizard/back', { step: 3 });
    expect(back.body.wizard).toMatchObject({ step: 3, selections: { schedule: { scheduledDate: date } } });
    const notReady = await customer.post('/api/booking/wizard/commit');
    expect(notReady.status).toBe(409);
    expect(notReady.body.code).toBe('NOT_READY');
    await customer.put('/api/booking/wizard/steps/3', { scheduledDate: date, scheduledTime: '10:00' });

    const committed = await customer.post('/api/booking/wizard/commit');
    expect(committed.status).toBe(201);
    expect(committed.body).toMatchObject({ success: true, seedsEarned: 25, seedsBalance: 525 });
    expect(committed.body.booking).toMatchObject({ status: 'pending', totalPriceCents: 7999 });

    const again = await customer.post('/api/booking/wizard/commit');
    expect(again.status).toBe(409);
    expect(again.body.code).toBe('ALREADY_COMMITTED');

    const list = await customer.get('/api/bookings');
    expect(list.body.bookings).toEqual([expect.objectContaining({ id: 1, serviceName: 'Lawn Mowing' })]);
    const stats = await customer.get('/api/stats');
    expect(stats.body).toMatchObject({ totalBookings: 1, pendingBookings: 1, totalSpentCents: 0 });

    const denied = await customer.post('/api/bookings/1/status', { status: 'confirmed' });
    expect(denied.status).toBe(403);

    const badStatus = await admin.post('/api/bookings/1/status', { status: 'done' });
    expect(badStatus.status).toBe(400);
    expect((await admin.post('/api/bookings/1/status', { status: 'confirmed' })).status).toBe(200);
    const completed = await admin.post('/api/bookings/1/status', { status: 'completed' });
    expect(completed.body).toMatchObject({ success: true, seedsChange: 100 });
    const invalid = await admin.post('/api/bookings/1/status', { status: 'cancelled' });
    expect(invalid.status).toBe(409);
    expect(invalid.body.code).toBe('INVALID_TRANSITION');

    const rewards = await customer.get('/api/rewards');
    expect(rewards.body).toMatchObject({ balance: 625, completedServices: 1 });

    const short = await customer.post('/api/rewards/redeem', { optionId: 'gold_member' });
    expect(short.status).toBe(409);
    expect(short.body).toMatchObject({ code: 'INSUFFICIENT_POINTS', balance: 625, cost: 1000 });

    const redeemed = await customer.post('/api/rewards/redeem', { optionId: 'discount_10' });
    expect(redeemed.status).toBe(200);
    expect(redeemed.body).toMatchObject({ success: true, balance: 525 });

    const historyRes = await customer.get('/api/rewards/history?limit=2');
    expect(historyRes.body.transactions).toEqual([
      expect.objectContaining({ reason: 'redemption', amount: -100 }),
      expect.objectContaining({ reason: 'service_completed', amount: 100 }),
    ]);

    const receipts = await customer.get('/api/receipts');
    expect(receipts.body.receipts).toEqual([expect.objectContaining({ id: 1, status: 'completed' })]);
  });

  it('abandons the wizard on request', async () => {
    const client = await registerClient('liam', 'liam@example.test');
    await client.post('/api/booking/wizard');

    expect((await client.delete('/api/booking/wizard')).status).toBe(200);
    expect((await client.get('/api/booking/wizard')).status).toBe(404);
  });

  it('serves fallback weather without an API key', async () => {
    const client = await registerClient('mia', 'mia@example.test');

    const res = await client.get('/api/weather?location=Tampa');
    const status = await client.get('/api/weather/status');

    expect(res.status).toBe(200);
    expect(res.body.weather).toMatchObject({ location: 'Tampa', temperature: 72, condition: 'Partly Cloudy', mock: true });
    expect(status.body).toMatchObject({ success: true, apiKeyConfigured: false, cacheEntries: 0 });
  });

  it('answers malformed JSON with a validation error', async () => {
    const res = await new ApiClient().request('POST', '/api/auth/login', undefined, '{"email":');

    expect(res.status).toBe(400);
    expect(res.body.code).toBe('VALIDATION_ERROR');
  });
});
