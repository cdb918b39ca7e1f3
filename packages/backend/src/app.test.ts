import assert from 'node:assert/strict';
import test from 'node:test';
import request from 'supertest';
import { API_PREFIX, createApp } from './app.js';
import type { AuthConfig } from './auth.js';
import { createSilentLogger } from './logger.js';
import { ChangeCoordinator } from './services/coordinator.js';

const localAuth: AuthConfig = { mode: 'local', defaultUserName: 'alice' };
const tokenAuth: AuthConfig = { mode: 'token', tokenSecret: 'test-secret', tokenTtlMs: 3600_000 };

const createTestApp = (auth: AuthConfig = localAuth) => {
  const logger = createSilentLogger();
  const coordinator = new ChangeCoordinator({ logger });
  return { app: createApp({ coordinator, auth, logger }), coordinator };
};

const api = (path: string) => `${API_PREFIX}${path}`;

const migration = {
  title: 'Migrate schema',
  purpose: 'Add the audit table',
  url: 'https://example.com/runbooks/migrate',
  components: ['db'],
  locks: ['db']
};

const seedComponent = async (app: ReturnType<typeof createTestApp>['app']) => {
  const response = await request(app)
    .post(api('/components'))
    .send({ name: 'db', description: 'Primary database', owners: ['alice'] });
  assert.equal(response.status, 201);
};

test('GET /health responds with ok status', async () => {
  const { app } = createTestApp();

  const response = await request(app).get('/health');

  assert.equal(response.status, 200);
  assert.deepEqual(response.body, { status: 'ok' });
});

test('POST /components creates a component owned by the local user', async () => {
  const { app } = createTestApp();

  const response = await request(app)
    .post(api('/components'))
    .send({ name: ' db ', description: 'Primary database', owners: ['alice', 'alice'] });

  assert.equal(response.status, 201);
  assert.deepEqual(response.body, {
    component: { name: 'db', description: 'Primary database', owners: ['alice'] }
  });

  const list = await request(app).get(api('/components'));
  assert.deepEqual(list.body, { components: [response.body.component] });

  const single = await request(app).get(api('/components/db'));
  assert.deepEqual(single.body, { component: response.body.component });
});

test('unknown entities respond with 404 and the entity in details', async () => {
  const { app } = createTestApp();

  const response = await request(app).get(api('/tags/infra'));

  assert.equal(response.status, 404);
  assert.deepEqual(response.body, {
    message: 'tag infra not found',
    code: 'NotFound',
    details: { entity: 'tag', id: 'infra' }
  });
});

test('duplicate tags are rejected with AlreadyExists', async () => {
  const { app } = createTestApp();
  await request(app).post(api('/tags')).send({ name: 'infra', description: 'Infrastructure' });

  const response = await request(app).post(api('/tags')).send({ name: 'infra', description: 'Again' });

  assert.equal(response.status, 400);
  assert.equal(response.body.code, 'AlreadyExists');
  const tags = await request(app).get(api('/tags'));
  assert.deepEqual(tags.body, { tags: [{ name: 'infra', description: 'Infrastructure' }] });
});

test('operations move through their lifecycle over HTTP', async () => {
  const { app } = createTestApp();
  await seedComponent(app);

  const created = await request(app).post(api('/operations')).send(migration);
  assert.equal(created.status, 201);
  assert.equal(created.body.operation.id, 1234);
  assert.equal(created.body.operation.status, 'planned');
  assert.deepEqual(created.body.operation.operators, ['alice']);

  const started = await request(app).patch(api('/operations/1234')).send({ status: 'in_progress' });
  assert.equal(started.status, 200);
  assert.equal(started.body.operation.status, 'in_progress');

  const locks = await request(app).get(api('/locks'));
  assert.deepEqual(locks.body, { locks: [{ component: 'db', mode: 'exclusive', holders: [1234] }] });

  const invalid = await request(app).patch(api('/operations/1234')).send({ status: 'planned' });
  assert.equal(invalid.status, 400);
  assert.deepEqual(invalid.body.details, { from: 'in_progress', to: 'planned' });

  const completed = await request(app).patch(api('/operations/1234')).send({ status: 'completed' });
  assert.equal(completed.body.operation.status, 'completed');
  assert.deepEqual((await request(app).get(api('/locks'))).body, { locks: [] });

  const fetched = await request(app).get(api('/operations/1234'));
  assert.deepEqual(fetched.body, { operation: completed.body.operation });
});

test('conflicting starts leave exactly one operation holding the lock', async () => {
  const { app } = createTestApp();
  await seedComponent(app);
  await request(app).post(api('/operations')).send(migration);
  await request(app).post(api('/operations')).send({ ...migration, title: 'Reindex' });

  const responses = await Promise.all([
    request(app).patch(api('/operations/1234')).send({ status: 'in_progress' }),
    request(app).patch(api('/operations/1235')).send({ status: 'in_progress' })
  ]);

  const statuses = responses.map((response) => response.status).sort();
  assert.deepEqual(statuses, [200, 423]);
  const failed = responses.find((response) => response.status === 423);
  assert.deepEqual(failed?.body, {
    message: 'failed to acquire lock on component db',
    code: 'LockFailed',
    details: { component: 'db' }
  });

  const locks = await request(app).get(api('/locks'));
  assert.equal(locks.body.locks.length, 1);
  assert.equal(locks.body.locks[0].holders.length, 1);
});

test('starting before dependencies complete responds with 424', async () => {
  const { app } = createTestApp();
  await seedComponent(app);
  await request(app).post(api('/operations')).send({ ...migration, locks: [] });
  await request(app).post(api('/operations')).send({ ...migration, locks: [], dependsOn: [1234] });

  const response = await request(app).patch(api('/operations/1235')).send({ status: 'in_progress' });

  assert.equal(response.status, 424);
  assert.equal(response.body.code, 'UnmetDependency');
  assert.deepEqual(response.body.details, { dependency: '1234' });
});

test('validation failures map to 400 responses', async () => {
  const { app } = createTestApp();
  await seedComponent(app);

  const blank = await request(app).post(api('/operations')).send({ ...migration, title: '' });
  assert.equal(blank.status, 400);
  assert.equal(blank.body.code, 'BlankItem');

  const scheme = await request(app).post(api('/operations')).send({ ...migration, url: 'file:///tmp/runbook' });
  assert.equal(scheme.body.code, 'InvalidUrlScheme');

  const wrongType = await request(app).post(api('/operations')).send({ ...migration, components: 'db' });
  assert.equal(wrongType.status, 400);
  assert.deepEqual(wrongType.body, {
    message: 'components must be a list of strings',
    code: 'InvalidRequest',
    details: { field: 'components' }
  });

  const badId = await request(app).get(api('/operations/latest'));
  assert.equal(badId.status, 400);
  assert.equal(badId.body.code, 'InvalidRequest');

  const malformed = await request(app)
    .post(api('/tags'))
    .set('Content-Type', 'application/json')
    .send('{"name": ');
  assert.equal(malformed.status, 400);
  assert.deepEqual(malformed.body, { message: 'Malformed JSON body', code: 'InvalidRequest', details: {} });
});

test('GET /operations filters by query parameters', async () => {
  const { app } = createTestApp();
  await seedComponent(app);
  await request(app).post(api('/tags')).send({ name: 'infra', description: 'Infrastructure' });
  await request(app).post(api('/operations')).send({ ...migration, locks: [], tags: ['infra'] });
  await request(app).post(api('/operations')).send({ ...migration, locks: [] });
  await request(app).patch(api('/operations/1235')).send({ status: 'canceled' });

  const tagged = await request(app).get(api('/operations')).query({ tag: 'infra' });
  assert.deepEqual(
    tagged.body.operations.map((operation: { id: number }) => operation.id),
    [1234]
  );

  const byStatus = await request(app).get(api('/operations?status=canceled&status=planned'));
  assert.deepEqual(
    byStatus.body.operations.map((operation: { id: number }) => operation.id),
    [1234, 1235]
  );

  const unknown = await request(app).get(api('/operations')).query({ status: 'finished' });
  assert.equal(unknown.status, 400);
});

test('subscriptions are stored per user', async () => {
  const { app } = createTestApp();
  await seedComponent(app);

  const created = await request(app).post(api('/subscriptions')).send({ component: 'db' });
  assert.equal(created.status, 201);
  assert.deepEqual(created.body, { subscriptions: { operations: [], components: ['db'], tags: [] } });

  const listed = await request(app).get(api('/subscriptions'));
  assert.deepEqual(listed.body, created.body);

  const ambiguous = await request(app).post(api('/subscriptions')).send({ component: 'db', operation: 1234 });
  assert.equal(ambiguous.status, 400);
  assert.equal(ambiguous.body.code, 'SubscribingMultipleEntities');
});

test('token mode requires a bearer token issued by POST /auth', async () => {
  const { app, coordinator } = createTestApp(tokenAuth);

  const anonymous = await request(app).get(api('/components'));
  assert.equal(anonymous.status, 401);
  assert.equal(anonymous.body.code, 'MissingToken');

  const forged = await request(app).get(api('/components')).set('Authorization', 'Bearer forged.token.value');
  assert.equal(forged.status, 401);
  assert.equal(forged.body.code, 'InvalidToken');

  const login = await request(app).post(api('/auth')).send({ username: ' bob ' });
  assert.equal(login.status, 201);
  assert.deepEqual(login.body.user, { name: 'bob' });
  assert.equal(typeof login.body.token, 'string');
  assert.equal(coordinator.getUser('bob').name, 'bob');

  const again = await request(app).post(api('/auth')).send({ username: 'bob' });
  assert.equal(again.status, 201);

  const authorized = await request(app)
    .get(api('/subscriptions'))
    .set('Authorization', `Bearer ${login.body.token}`);
  assert.equal(authorized.status, 200);
  assert.deepEqual(authorized.body, { subscriptions: { operations: [], components: [], tags: [] } });

  const blank = await request(app).post(api('/auth')).send({ username: '  ' });
  assert.equal(blank.status, 400);
  assert.equal(blank.body.code, 'BlankItem');
});

test('token mode without a google client id does not expose google sign-in', async () => {
  const { app } = createTestApp(tokenAuth);

  const response = await request(app).post(api('/auth/google')).send({ credential: 'credential' });

  assert.equal(response.status, 401);
});

test('local mode does not expose POST /auth', async () => {
  const { app } = createTestApp();

  const response = await request(app).post(api('/auth')).send({ username: 'bob' });

  assert.equal(response.status, 404);
});
