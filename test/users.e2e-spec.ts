import {
  bearer,
  createTestApp,
  registerUser,
  RegisteredUser,
  TestApp,
} from './support/test-app';

describe('Users (e2e)', () => {
  let testApp: TestApp;
  let alice: RegisteredUser;
  let bob: RegisteredUser;
  let carol: RegisteredUser;

  beforeEach(async () => {
    testApp = await createTestApp();
    alice = await registerUser(testApp, 'alice');
    testApp.clock.advance(1000);
    bob = await registerUser(testApp, 'bob');
    testApp.clock.advance(1000);
    carol = await registerUser(testApp, 'carol');
  });

  afterEach(async () => {
    await testApp.app.close();
  });

  it('lists everyone else, newest first', async () => {
    const response = await testApp
      .http()
      .get('/api/users')
      .set('Authorization', bearer(alice.tokens.access_token))
      .expect(200);
    expect(response.body.map((user: { username: string }) => user.username)).toEqual([
      'carol',
      'bob',
    ]);

    const limited = await testApp
      .http()
      .get('/api/users?limit=1')
      .set('Authorization', bearer(alice.tokens.access_token))
      .expect(200);
    expect(limited.body).toHaveLength(1);

    await testApp
      .http()
      .get('/api/users?limit=0')
      .set('Authorization', bearer(alice.tokens.access_token))
      .expect(400);
  });

  it('updates the own profile', async () => {
    const response = await testApp
      .http()
      .put('/api/users/me')
      .set('Authorization', bearer(alice.tokens.access_token))
      .send({ first_name: 'Alice', password: 'changed-password' })
      .expect(200);

    expect(response.body).toMatchObject({
      username: 'alice',
      first_name: 'Alice',
      last_name: 'User',
      updated_at: testApp.clock.now().toISOString(),
    });
    await testApp
      .http()
      .post('/api/auth/login')
      .send({ username: 'alice', password: 'changed-password' })
      .expect(200);
  });

  it('keeps a refresh token from speaking for the next holder of a username', async () => {
    await testApp
      .http()
      .put('/api/users/me')
      .set('Authorization', bearer(alice.tokens.access_token))
      .send({ username: 'alice2', email: 'alice2@example.com' })
      .expect(200);
    const newcomer = await registerUser(testApp, 'alice');
    expect(newcomer.id).not.toBe(alice.id);

    const refused = await testApp
      .http()
      .post('/api/auth/refresh')
      .send({ refresh_token: alice.tokens.refresh_token })
      .expect(401);
    expect(refused.body.message).toBe('Invalid refresh token');

    await testApp
      .http()
      .post('/api/auth/refresh')
      .send({ refresh_token: newcomer.tokens.refresh_token })
      .expect(200);
  });

  it('refuses to take over another account email', async () => {
    const response = await testApp
      .http()
      .put('/api/users/me')
      .set('Authorization', bearer(alice.tokens.access_token))
      .send({ email: 'bob@example.com' })
      .expect(400);

    expect(response.body.message).toBe('Email already registered');
  });

  it('lets admins read and delete accounts', async () => {
    await testApp
      .http()
      .delete(`/api/users/${bob.id}`)
      .set('Authorization', bearer(alice.tokens.access_token))
      .expect(403);

    testApp.users.patch(alice.id, { isAdmin: true });

    const found = await testApp
      .http()
      .get(`/api/users/${carol.id}`)
      .set('Authorization', bearer(alice.tokens.access_token))
      .expect(200);
    expect(found.body.email).toBe('carol@example.com');

    await testApp
      .http()
      .delete(`/api/users/${bob.id}`)
      .set('Authorization', bearer(alice.tokens.access_token))
      .expect(200, { message: 'User deleted successfully' });
    await testApp
      .http()
      .delete(`/api/users/${bob.id}`)
      .set('Authorization', bearer(alice.tokens.access_token))
      .expect(404);
  });
});
