import type { Server } from 'node:http';
import { afterAll, beforeAll, beforeEach, describe, expect, it, vi } from 'vitest';
import { createApp } from './app';
import type { FoodLookup, FoodMatch } from './tracker/lookups';
import { TrackerService } from './tracker/trackerService';

const foodLookup: FoodLookup = {
    async findFood(description: string): Promise<FoodMatch | null> {
        if (description === 'offline') {
            throw new Error('network down');
        }
        return description === 'banana' ? { name: 'Banana', kcal_per_100g: 89 } : null;
    }
};

describe('HTTP command surface', () => {
    let server: Server;
    let baseUrl: string;

    const call = async (method: 'GET' | 'POST', path: string, body?: unknown) => {
        const response = await fetch(`${baseUrl}${path}`, {
            method,
            headers: body === undefined ? undefined : { 'Content-Type': 'application/json' },
            body: body === undefined ? undefined : JSON.stringify(body)
        });
        return { status: response.status, body: await response.json() };
    };

    beforeAll(async () => {
        const service = new TrackerService({
            food: foodLookup,
            weather: null,
            clock: { now: () => new Date('2024-05-01T12:00:00Z') },
            timeZone: 'UTC'
        });
        const app = createApp({ service, corsOrigins: ['http://localhost:5173'] });

        server = await new Promise<Server>((resolve) => {
            const listening = app.listen(0, '127.0.0.1', () => resolve(listening));
        });
        const address = server.address();
        if (!address || typeof address === 'string') {
            throw new Error('Expected a TCP address');
        }
        baseUrl = `http://127.0.0.1:${address.port}/api`;
    });

    afterAll(async () => {
        server.closeAllConnections();
        await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
    });

    beforeEach(() => {
        vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    });

    it('answers the health check', async () => {
        expect(await call('GET', '/health')).toEqual({ status: 200, body: { status: 'ok' } });
    });

    it('runs the setup dialog to completion', async () => {
        expect(await call('POST', '/users/alice/setup/start')).toEqual({
            status: 200,
            body: { state: 'AwaitingWeight', field: 'weight_kg', prompt: 'Enter your weight (kg):' }
        });

        const rejected = await call('POST', '/users/alice/setup/submit', { text: '-5' });
        expect(rejected).toEqual({
            status: 400,
            body: { message: 'Weight must be a number greater than 0. Enter your weight again.', kind: 'validation' }
        });

        for (const text of ['80', '184', '26', '45']) {
            expect((await call('POST', '/users/alice/setup/submit', { text })).body.status).toBe('awaiting');
        }
        expect((await call('GET', '/users/alice/setup')).body).toMatchObject({ state: 'AwaitingCity' });
        await call('POST', '/users/alice/setup/submit', { text: 'Moscow' });

        expect(await call('POST', '/users/alice/setup/submit', { text: '0' })).toEqual({
            status: 200,
            body: {
                status: 'complete',
                profile: {
                    weight_kg: 80,
                    height_cm: 184,
                    age_years: 26,
                    activity_minutes_per_day: 45,
                    city: 'Moscow',
                    calorie_goal_override: 0
                },
                norms: { water_target_ml: 2900, calorie_target_kcal: 2220 },
                temperature_c: null
            }
        });
        expect((await call('GET', '/users/alice/profile')).body.city).toBe('Moscow');
    });

    it('reports missing sessions and profiles as 404s', async () => {
        expect(await call('POST', '/users/bob/setup/submit', { text: '80' })).toMatchObject({
            status: 404,
            body: { kind: 'no_active_session' }
        });
        expect(await call('GET', '/users/bob/progress')).toMatchObject({ status: 404, body: { kind: 'no_profile' } });
        expect(await call('POST', '/users/bob/setup/cancel')).toEqual({ status: 200, body: { cancelled: false } });
    });

    it('logs water and reflects it in progress', async () => {
        await call('POST', '/users/carol/setup/start');
        for (const text of ['80', '184', '26', '45', 'Moscow', '0']) {
            await call('POST', '/users/carol/setup/submit', { text });
        }

        expect(await call('POST', '/users/carol/logs/water', { amount_ml: 500 })).toEqual({
            status: 200,
            body: { water_ml: 500 }
        });
        expect((await call('POST', '/users/carol/logs/water', { amount_ml: 300 })).body).toEqual({ water_ml: 800 });

        const progress = await call('GET', '/users/carol/progress');
        expect(progress.body).toMatchObject({ water_consumed_ml: 800, water_target_ml: 2900, water_remaining_ml: 2100 });
    });

    it('rejects invalid amounts', async () => {
        expect(await call('POST', '/users/dave/logs/water', { amount_ml: -1 })).toMatchObject({
            status: 400,
            body: { kind: 'invalid_amount' }
        });
        expect(await call('POST', '/users/dave/logs/water', { amount_ml: 'lots' })).toMatchObject({
            status: 400,
            body: { kind: 'validation' }
        });
    });

    it('only takes JSON numbers as amounts', async () => {
        expect(await call('POST', '/users/dave/logs/water', { amount_ml: true })).toEqual({
            status: 400,
            body: { message: 'Invalid amount_ml: Expected number, received boolean', kind: 'validation' }
        });
        for (const amount_ml of [[500], '300']) {
            expect(await call('POST', '/users/dave/logs/water', { amount_ml })).toMatchObject({
                status: 400,
                body: { kind: 'validation' }
            });
        }
        expect(await call('POST', '/users/dave/logs/workout', { activity_type: 'run', minutes: '30' })).toMatchObject({
            status: 400,
            body: { kind: 'validation' }
        });
        expect((await call('GET', '/users/dave/logs')).body).toEqual({ dates: [] });
    });

    it('maps food lookup failures to 502 and records nothing', async () => {
        expect(await call('POST', '/users/erin/logs/food', { description: 'offline' })).toMatchObject({
            status: 502,
            body: { kind: 'lookup_unavailable' }
        });
        expect((await call('GET', '/users/erin/logs/2024-05-01')).body.food_entries).toEqual([]);
    });

    it('logs food and workouts and lists the day in history', async () => {
        expect((await call('POST', '/users/frank/logs/food', { description: 'banana', grams: 50 })).body).toMatchObject({
            product_name: 'Banana',
            calories: 44.5
        });
        expect(
            (await call('POST', '/users/frank/logs/workout', { activity_type: 'swim', minutes: 30 })).body
        ).toEqual({
            activity_type: 'swim',
            duration_minutes: 30,
            calories_burned: 270,
            logged_at: '2024-05-01T12:00:00.000Z',
            extra_water_ml: 200
        });
        expect(await call('GET', '/users/frank/logs')).toEqual({ status: 200, body: { dates: ['2024-05-01'] } });
        expect((await call('GET', '/users/frank/logs?limit=zero')).status).toBe(400);
    });
});
