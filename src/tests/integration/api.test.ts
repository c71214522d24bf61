import assert from 'node:assert/strict';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import type { Server } from 'node:http';
import { after, before, describe, it } from 'node:test';

import { createApp } from '../../app';
import { silentLogger } from '../../config/logger';
import { FakeLlm, matchingReplies } from '../fakes';

const RESUME = 'Jane Placeholder\nSkills: Python, TensorFlow, SQL\n';

describe('HTTP API', () => {
  let dataDir = '';
  let server: Server;
  let baseUrl = '';
  let pending: (() => Promise<void>)[] = [];
  const llm = new FakeLlm(matchingReplies());

  const runPending = async (): Promise<void> => {
    const tasks = pending;
    pending = [];
    for (const task of tasks) {
      await task();
    }
  };

  const readJson = async (response: Response): Promise<Record<string, unknown>> => {
    const body: unknown = await response.json();
    assert.ok(body && typeof body === 'object' && !Array.isArray(body));
    return Object.fromEntries(Object.entries(body));
  };

  const uploadResume = async (fileName: string, content: string): Promise<Response> => {
    const form = new FormData();
    form.append('resume', new Blob([content], { type: 'text/plain' }), fileName);
    return fetch(`${baseUrl}/upload`, { method: 'POST', body: form });
  };

  const uploadFields = async (fields: Record<string, [fileName: string, content: string]>): Promise<Response> => {
    const form = new FormData();
    Object.entries(fields).forEach(([field, [fileName, content]]) => {
      form.append(field, new Blob([content], { type: 'text/plain' }), fileName);
    });
    return fetch(`${baseUrl}/upload`, { method: 'POST', body: form });
  };

  const storedUploads = (): string[] => fs.readdirSync(path.join(dataDir, 'files')).sort();

  const fileIds = async (response: Response): Promise<Record<string, string>> => {
    const { files } = await readJson(response);
    assert.ok(Array.isArray(files));
    return Object.fromEntries(files.map((file): [string, string] => [
      String(Reflect.get(file, 'kind')),
      String(Reflect.get(file, 'id')),
    ]));
  };

  const lastCall = (step: string): Record<string, unknown> | undefined =>
    llm.calls.filter((call) => call.step === step).at(-1)?.input;

  const postJson = (route: string, body: unknown, method = 'POST'): Promise<Response> =>
    fetch(`${baseUrl}${route}`, {
      method,
      headers: { 'content-type': 'application/json' },
      body: JSON.stringify(body),
    });

  before(async () => {
    dataDir = fs.mkdtempSync(path.join(os.tmpdir(), 'screener-api-'));
    const app = createApp({
      config: { dataDir, maxUploadBytes: 1024 },
      logger: silentLogger,
      llm,
      schedule: (task) => {
        pending.push(task);
      },
    });

    server = await new Promise<Server>((resolve) => {
      const listening = app.listen(0, '127.0.0.1', () => resolve(listening));
    });
    const address = server.address();
    assert.ok(address && typeof address === 'object');
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  after(async () => {
    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
    fs.rmSync(dataDir, { recursive: true, force: true });
  });

  it('reports health', async () => {
    const response = await fetch(`${baseUrl}/health`);

    assert.equal(response.status, 200);
    assert.deepEqual(await response.json(), { status: 'ok' });
  });

  it('uploads a resume, screens it and serves the report', async () => {
    const upload = await uploadResume('resume.txt', RESUME);
    assert.equal(upload.status, 200);

    const uploadBody = await readJson(upload);
    const files = uploadBody.files;
    assert.ok(Array.isArray(files) && files.length === 1);
    const [resume] = files;
    assert.equal(Reflect.get(resume, 'kind'), 'resume');
    assert.equal(Reflect.get(resume, 'name'), 'resume.txt');
    const resumeId = Reflect.get(resume, 'id');
    assert.ok(typeof resumeId === 'string' && resumeId.startsWith('res_'));

    const queued = await postJson('/screen', {
      resume_file_id: resumeId,
      job_description: 'Python developer with machine learning experience.',
    });
    assert.equal(queued.status, 202);
    const queuedBody = await readJson(queued);
    assert.equal(queuedBody.status, 'queued');
    const jobId = queuedBody.id;
    assert.equal(typeof jobId, 'string');

    const queuedStatus = await readJson(await fetch(`${baseUrl}/result/${String(jobId)}`));
    assert.deepEqual(queuedStatus, { id: jobId, status: 'queued' });

    await runPending();

    const done = await readJson(await fetch(`${baseUrl}/result/${String(jobId)}`));
    assert.equal(done.status, 'completed');
    const reportText = Reflect.get(Object(done.result), 'report_text');
    assert.equal(typeof reportText, 'string');
    assert.equal(String(reportText).split('\n')[7], 'Candidate Fit Score: 82/100');

    const extraction = llm.calls.find((call) => call.step === 'extraction');
    assert.equal(extraction?.input.resumeText, 'Jane Placeholder\nSkills: Python, TensorFlow, SQL');
  });

  it('fails the job, not the request, for an unknown resume id', async () => {
    const queued = await postJson('/screen', { resume_file_id: 'res_missing', job_description: 'jd' });
    assert.equal(queued.status, 202);
    const { id } = await readJson(queued);

    await runPending();

    assert.deepEqual(await readJson(await fetch(`${baseUrl}/result/${String(id)}`)), {
      id,
      status: 'failed',
      error: 'No resume file found with id "res_missing".',
    });
  });

  it('requires exactly one job description source', async () => {
    const response = await postJson('/screen', { resume_file_id: 'res_1' });

    assert.equal(response.status, 400);
    assert.deepEqual(await response.json(), {
      error: {
        code: 'validation_failed',
        message: 'Request validation failed.',
        issues: [
          { path: 'job_description', message: 'Provide exactly one of job_description or job_description_file_id' },
        ],
      },
    });
  });

  it('rejects malformed JSON', async () => {
    const response = await fetch(`${baseUrl}/screen`, {
      method: 'POST',
      headers: { 'content-type': 'application/json' },
      body: '{"resume_file_id":',
    });

    assert.equal(response.status, 400);
    assert.deepEqual(await response.json(), {
      error: { code: 'validation_failed', message: 'Malformed JSON body.' },
    });
  });

  it('rejects unsupported and oversized uploads', async () => {
    const unsupported = await uploadResume('resume.docx', 'binary');
    assert.equal(unsupported.status, 415);
    assert.equal(Reflect.get(Object((await readJson(unsupported)).error), 'code'), 'unsupported_document');

    const oversized = await uploadResume('resume.txt', 'x'.repeat(2048));
    assert.equal(oversized.status, 413);
    assert.equal(Reflect.get(Object((await readJson(oversized)).error), 'code'), 'file_too_large');
  });

  it('returns 404 for unknown jobs', async () => {
    const response = await fetch(`${baseUrl}/result/does-not-exist`);

    assert.equal(response.status, 404);
    assert.deepEqual(await response.json(), { error: { code: 'not_found', message: 'Job not found' } });
  });

  it('saves and returns user preferences with defaults', async () => {
    const empty = await fetch(`${baseUrl}/users/user-1/preferences`);
    assert.deepEqual(await empty.json(), {
      user_id: 'user-1',
      name: 'Not provided',
      preferred_roles: 'Not specified',
    });

    const saved = await postJson('/users/user-1/preferences', { name: 'Sam', preferred_roles: 'AI and data science' }, 'PUT');
    assert.equal(saved.status, 200);

    const loaded = await fetch(`${baseUrl}/users/user-1/preferences`);
    assert.deepEqual(await loaded.json(), {
      user_id: 'user-1',
      name: 'Sam',
      preferred_roles: 'AI and data science',
    });
  });
  it('accepts a job description upload and screens against it with saved preferences', async () => {
    const upload = await uploadFields({
      resume: ['resume.txt', RESUME],
      job_description: ['role.md', '# ML Engineer\nPython and TensorFlow required.\n'],
    });
    assert.equal(upload.status, 200);

    const ids = await fileIds(upload);
    assert.deepEqual(Object.keys(ids), ['resume', 'job_description']);
    assert.ok(ids.resume?.startsWith('res_'));
    assert.ok(ids.job_description?.startsWith('jd_'));

    const saved = await postJson('/users/reviewer-2/preferences', { name: 'Sam', preferred_roles: 'ML platform' }, 'PUT');
    assert.equal(saved.status, 200);

    const queued = await postJson('/screen', {
      resume_file_id: ids.resume,
      job_description_file_id: ids.job_description,
      user_id: 'reviewer-2',
    });
    assert.equal(queued.status, 202);
    const { id } = await readJson(queued);

    await runPending();

    const done = await readJson(await fetch(`${baseUrl}/result/${String(id)}`));
    assert.equal(done.status, 'completed');
    assert.equal(lastCall('matching')?.jobDescription, '# ML Engineer\nPython and TensorFlow required.');
    assert.equal(lastCall('recommendation')?.reviewerName, 'Sam');
    assert.equal(lastCall('recommendation')?.reviewerPreferredRoles, 'ML platform');
  });

  it('rejects a resume id passed as the job description file', async () => {
    const ids = await fileIds(await uploadFields({ resume: ['resume.txt', RESUME] }));

    const queued = await postJson('/screen', { resume_file_id: ids.resume, job_description_file_id: ids.resume });
    const { id } = await readJson(queued);

    await runPending();

    const failed = await readJson(await fetch(`${baseUrl}/result/${String(id)}`));
    assert.equal(failed.status, 'failed');
    assert.equal(failed.error, `No job description file found with id "${String(ids.resume)}".`);
  });

  it('removes written files when the upload is rejected', async () => {
    const existing = storedUploads();

    const missingResume = await uploadFields({ job_description: ['role.md', 'Python developer'] });
    assert.equal(missingResume.status, 400);
    assert.deepEqual(storedUploads(), existing);

    const unsupportedSecond = await uploadFields({
      resume: ['resume.txt', RESUME],
      job_description: ['role.docx', 'binary'],
    });
    assert.equal(unsupportedSecond.status, 415);
    assert.deepEqual(storedUploads(), existing);
  });
});
