import request from 'supertest';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { parseConfig } from '../../src/config/index.js';
import { createApp, createAppContext, type AppContext } from '../../src/createServer.js';
import { createEmptyMergedMetadata, createVersionRecord } from '../../src/services/detection/duplicateGrouper.js';
import { ScanLock } from '../../src/services/scanLock.js';
import { InMemoryCatalog } from '../helpers/inMemoryCatalog.js';
import { hdWebDl, makeItem, uhdRemux } from '../helpers/mediaItems.js';
import { createSilentLogger } from '../helpers/silentLogger.js';
import { createTestDatabase, type TestDatabaseHandle } from '../helpers/testDatabase.js';

const API_TOKEN = 'test-token';

type PendingRequest = ReturnType<ReturnType<typeof request>['get']>;

describe('HTTP API', () => {
  let dbHandle: TestDatabaseHandle;
  let lock: ScanLock;
  let context: AppContext;
  let app: ReturnType<typeof createApp>;

  const withAuth = (builder: PendingRequest) => builder.set('Authorization', `Bearer ${API_TOKEN}`);

  const build = (catalog: InMemoryCatalog | null) => {
    context = createAppContext(parseConfig({ NODE_ENV: 'test', API_TOKEN }), {
      drizzleDatabase: dbHandle.db,
      catalog,
      scanLock: lock,
      getFileSize: () => 0,
      log: createSilentLogger(),
    });
    app = createApp(context);
  };

  const seedGroup = () => {
    const items = [uhdRemux('a'), hdWebDl('b')];
    context.repositories.groups.save('lib-1', [
      {
        groupId: 'g-1',
        libraryId: 'lib-1',
        primaryVersionId: 'a',
        versions: items.map((item) => createVersionRecord(item, 0)),
        mergedMetadata: createEmptyMergedMetadata(),
        detectedAt: '2026-01-01T00:00:00.000Z',
        lastReviewedAt: null,
        status: 'pending',
      },
    ]);
  };

  beforeEach(() => {
    dbHandle = createTestDatabase();
    lock = new ScanLock();
    build(
      new InMemoryCatalog().addLibrary({ id: 'lib-1', name: 'Movies', collectionType: 'movies' }, [
        uhdRemux('a'),
        hdWebDl('b'),
        makeItem({ id: 'c', name: 'Ronin' }),
      ]),
    );
  });

  afterEach(async () => {
    await context.scanService?.waitForIdle();
    dbHandle.cleanup();
  });

  describe('health and auth', () => {
    it('reports health without credentials', async () => {
      const response = await request(app).get('/health');

      expect(response.status).toBe(200);
      expect(response.body).toMatchObject({
        status: 'ok',
        environment: 'test',
        details: { catalogConfigured: true, scannerEnabled: true, scanning: false, dryRun: false },
      });
    });

    it('reports degraded health without a catalog', async () => {
      build(null);

      const response = await request(app).get('/health');

      expect(response.body.status).toBe('degraded');
    });

    it('rejects API calls without a token', async () => {
      const response = await request(app).get('/api/libraries');

      expect(response.status).toBe(401);
      expect(response.headers['www-authenticate']).toBe('Bearer realm="ReelSift"');
      expect(response.body.error.message).toBe('Unauthorized');
    });

    it('accepts the token as an X-API-Key header', async () => {
      const response = await request(app).get('/api/libraries').set('X-API-Key', API_TOKEN);

      expect(response.status).toBe(200);
    });
  });

  describe('libraries', () => {
    it('lists catalog libraries', async () => {
      const response = await withAuth(request(app).get('/api/libraries'));

      expect(response.body).toEqual({ libraries: [{ id: 'lib-1', name: 'Movies', collectionType: 'movies' }] });
    });

    it('responds with 503 without a catalog', async () => {
      build(null);

      const response = await withAuth(request(app).get('/api/libraries'));

      expect(response.status).toBe(503);
      expect(response.body.error.message).toBe('Media catalog is not configured.');
    });

    it('returns the stored duplicate groups, optionally filtered by status', async () => {
      seedGroup();

      const all = await withAuth(request(app).get('/api/libraries/lib-1/duplicates'));
      const ignored = await withAuth(request(app).get('/api/libraries/lib-1/duplicates?status=ignored'));

      expect(all.body.total).toBe(1);
      expect(all.body.groups[0].groupId).toBe('g-1');
      expect(ignored.body).toEqual({ libraryId: 'lib-1', total: 0, groups: [] });
    });

    it('records a review with a new primary', async () => {
      seedGroup();

      const response = await withAuth(
        request(app).patch('/api/libraries/lib-1/duplicates/g-1').send({ status: 'reviewed', primaryVersionId: 'b' }),
      );

      expect(response.status).toBe(200);
      expect(response.body).toMatchObject({ status: 'reviewed', primaryVersionId: 'b' });
      expect(typeof response.body.lastReviewedAt).toBe('string');
    });

    it('rejects a primary outside the group', async () => {
      seedGroup();

      const response = await withAuth(
        request(app).patch('/api/libraries/lib-1/duplicates/g-1').send({ status: 'reviewed', primaryVersionId: 'zzz' }),
      );

      expect(response.status).toBe(400);
      expect(response.body.error.message).toBe('primaryVersionId must reference a member of the group.');
    });

    it('validates the review body', async () => {
      seedGroup();

      const response = await withAuth(
        request(app).patch('/api/libraries/lib-1/duplicates/g-1').send({ status: 'deleted' }),
      );

      expect(response.status).toBe(400);
      expect(response.body.error.message).toBe('Validation failed');
    });

    it('responds with 404 for unknown groups', async () => {
      const response = await withAuth(
        request(app).patch('/api/libraries/lib-1/duplicates/missing').send({ status: 'ignored' }),
      );

      expect(response.status).toBe(404);
    });

    it('reads and updates preferences', async () => {
      const initial = await withAuth(request(app).get('/api/libraries/lib-1/preferences'));
      expect(initial.body.similarityThreshold).toBe(50);

      const updated = await withAuth(
        request(app).put('/api/libraries/lib-1/preferences').send({ similarityThreshold: 80 }),
      );

      expect(updated.status).toBe(200);
      expect(updated.body).toMatchObject({ libraryId: 'lib-1', similarityThreshold: 80, requireManualReview: true });
    });

    it('rejects unknown preference fields', async () => {
      const response = await withAuth(request(app).put('/api/libraries/lib-1/preferences').send({ colour: 'red' }));

      expect(response.status).toBe(400);
    });
  });

  describe('scans', () => {
    it('starts a scan and exposes its progress', async () => {
      const started = await withAuth(request(app).post('/api/scans').send({}));

      expect(started.status).toBe(202);
      const { jobId } = started.body.job;
      await context.scanService?.waitForIdle();

      const job = await withAuth(request(app).get(`/api/scans/${jobId}`));
      expect(job.body).toMatchObject({ jobId, status: 'completed', duplicatesFound: 1, progressPercentage: 100 });

      const duplicates = await withAuth(request(app).get('/api/libraries/lib-1/duplicates'));
      expect(duplicates.body.total).toBe(1);

      const list = await withAuth(request(app).get('/api/scans'));
      expect(list.body.jobs.map((entry: { jobId: string }) => entry.jobId)).toEqual([jobId]);
    });

    it('responds with 409 while another scan holds the lock', async () => {
      lock.tryAcquire('scheduler');

      const response = await withAuth(request(app).post('/api/scans').send({ libraryId: 'lib-1' }));

      expect(response.status).toBe(409);
      expect(response.body.error.details).toEqual({ owner: 'scheduler' });
    });

    it('responds with 503 when no catalog is configured', async () => {
      build(null);

      const response = await withAuth(request(app).post('/api/scans').send({}));

      expect(response.status).toBe(503);
    });

    it('refuses to cancel a finished job', async () => {
      const job = context.repositories.jobs.create(null);
      context.repositories.jobs.update(job.jobId, { status: 'completed' });

      const finished = await withAuth(request(app).post(`/api/scans/${job.jobId}/cancel`));
      const missing = await withAuth(request(app).post('/api/scans/missing/cancel'));

      expect(finished.status).toBe(409);
      expect(missing.status).toBe(404);
    });
  });

  describe('audit', () => {
    const auditBody = {
      groupId: 'g-1',
      itemId: 'b',
      filePath: '/movies/b.mkv',
      qualityScore: 43,
      deletionReason: 'lower quality duplicate',
      userInitiated: true,
      userId: 'admin',
      success: true,
      timestamp: '2026-02-10T12:00:00.000Z',
    };

    it('appends and lists audit records', async () => {
      const created = await withAuth(request(app).post('/api/audit').send(auditBody));

      expect(created.status).toBe(201);
      expect(created.body).toMatchObject({ itemId: 'b', errorMessage: null, timestamp: '2026-02-10T12:00:00.000Z' });

      const listed = await withAuth(request(app).get('/api/audit?from=2026-02-01&to=2026-02-28'));
      expect(listed.body.records).toHaveLength(1);

      const months = await withAuth(request(app).get('/api/audit/months'));
      expect(months.body).toEqual({ months: ['2026_02'] });
    });

    it('exports a month as newline-delimited JSON', async () => {
      await withAuth(request(app).post('/api/audit').send(auditBody));

      const response = await withAuth(request(app).get('/api/audit/months/2026_02'));

      expect(response.status).toBe(200);
      expect(response.headers['content-type']).toBe('application/x-ndjson; charset=utf-8');
      expect(response.headers['content-disposition']).toBe('attachment; filename="deletions_2026_02.jsonl"');
      const [line] = response.text.trimEnd().split('\n');
      expect(JSON.parse(line)).toMatchObject({ itemId: 'b', qualityScore: 43 });
    });

    it('validates query and path parameters', async () => {
      const badRange = await withAuth(request(app).get('/api/audit?from=yesterday'));
      const badMonth = await withAuth(request(app).get('/api/audit/months/2026-02'));

      expect(badRange.status).toBe(400);
      expect(badMonth.status).toBe(400);
    });
  });
});
