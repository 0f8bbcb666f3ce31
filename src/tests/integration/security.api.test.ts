import request from 'supertest';
import { createTestApp } from '@/tests/utils/testApp';

describe('Security headers', () => {
  const { app } = createTestApp();

  it('should set the hardening headers on every response', async () => {
    const response = await request(app).get('/').expect(200);

    expect(response.headers['x-frame-options']).toBe('SAMEORIGIN');
    expect(response.headers['x-xss-protection']).toBe('1; mode=block');
    expect(response.headers['x-content-type-options']).toBe('nosniff');
    expect(response.headers['content-security-policy']).toBe("default-src 'self';object-src 'none'");
    expect(response.headers['referrer-policy']).toBe('strict-origin-when-cross-origin');
  });

  it('should set them on error responses too', async () => {
    const response = await request(app).get('/accounts/0').expect(404);

    expect(response.headers['x-frame-options']).toBe('SAMEORIGIN');
    expect(response.headers['content-security-policy']).toBe("default-src 'self';object-src 'none'");
  });

  it('should allow cross-origin requests outside production', async () => {
    const response = await request(app)
      .get('/health')
      .set('Origin', 'http://localhost:3000')
      .expect(200);

    expect(response.headers['access-control-allow-origin']).toBe('*');
  });

  it('should not redirect plain HTTP unless FORCE_HTTPS is set', async () => {
    await request(app).get('/health').expect(200);
  });
});

describe('HTTPS redirect', () => {
  const { app } = createTestApp({ env: { FORCE_HTTPS: 'true', TRUST_PROXY: 'true' } });

  it('should redirect plain HTTP to the same URL over HTTPS', async () => {
    const response = await request(app).get('/accounts?x=1').expect(302);

    expect(response.headers.location).toMatch(/^https:\/\/127\.0\.0\.1:\d+\/accounts\?x=1$/);
  });

  it('should serve requests forwarded over HTTPS by a trusted proxy', async () => {
    const response = await request(app)
      .get('/health')
      .set('X-Forwarded-Proto', 'https')
      .expect(200);

    expect(response.body).toEqual({ status: 'OK' });
  });
});

describe('Rate limiting', () => {
  const { app } = createTestApp({ env: { RATE_LIMIT_MAX: '2' } });

  it('should answer 429 once a client exceeds the limit', async () => {
    await request(app).get('/accounts').expect(200);
    await request(app).get('/accounts').expect(200);

    const response = await request(app).get('/accounts').expect(429);

    expect(response.body).toEqual({
      success: false,
      error: {
        message: 'Too many requests. Please try again later. Limit: 2 requests per 60 seconds.',
      },
    });
  });

  it('should never limit the health check', async () => {
    await request(app).get('/health').expect(200);
    await request(app).get('/health').expect(200);
    await request(app).get('/health').expect(200);
  });
});
