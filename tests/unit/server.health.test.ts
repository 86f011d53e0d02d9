import request from 'supertest';
import { createApp } from '../../src/server/index';
import { GameSessionManager } from '../../src/server/game/GameSessionManager';
import { config } from '../../src/server/config';

describe('HTTP routes', () => {
  it('reports liveness with session counts on /health and /healthz', async () => {
    const manager = new GameSessionManager();
    manager.join('table-1', 'socket-1');
    manager.join('table-1', 'socket-2');
    const app = createApp(manager);

    for (const path of ['/health', '/healthz']) {
      const res = await request(app).get(path);

      expect(res.status).toBe(200);
      expect(res.body).toEqual({
        status: 'ok',
        version: config.app.version,
        sessions: 1,
        parties: 2,
      });
    }
  });

  it('returns a JSON 404 for unknown routes', async () => {
    const res = await request(createApp(new GameSessionManager())).get('/nope');

    expect(res.status).toBe(404);
    expect(res.body).toEqual({
      success: false,
      error: { message: 'Route not found', code: 'NOT_FOUND' },
    });
  });
});
