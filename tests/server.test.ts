import request from 'supertest';
import { createApp } from '@app/app';
import { createTestContext } from './helpers';

describe('Server Tests', () => {
    const app = createApp(createTestContext().deps);

    it('answers the health check', async () => {
        const response = await request(app).get('/api/v1/healthcheck');

        expect(response.status).toBe(200);
        expect(response.body).toEqual({ status: 'ok' });
    });

    it('returns a JSON 404 for unknown routes', async () => {
        const response = await request(app).get('/api/v1/nope');

        expect(response.status).toBe(404);
        expect(response.body).toEqual({
            error: { code: 404, message: 'Not Found: GET on /api/v1/nope', kind: 'RouteNotFound' },
        });
    });

    it('serves the API docs', async () => {
        const response = await request(app).get('/api/v1/docs/');

        expect(response.status).toBe(200);
        expect(response.text).toContain('swagger-ui');
    });
});
