import * as path from 'path';
import * as fse from 'fs-extra';
import { CriteriaExtractor } from '../criteriaExtractor';
import { ApiContext, ApiRequest, createApiContext, handleRequest } from '../handler';
import { FakeRasterizer, FakeService, makeEntity, makePdf, makeResponse, makeTempDir } from './helpers';

function request(method: string, url: string, body: Buffer = Buffer.alloc(0), headers: ApiRequest['headers'] = {}): ApiRequest {
  return { method, url, headers, body };
}

async function settle(context: ApiContext): Promise<void> {
  await Promise.all([...context.inFlight]);
}

describe('handleRequest', () => {
  let context: ApiContext;
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await makeTempDir();
    const extractor = new CriteriaExtractor(
      {
        service: new FakeService(async () => makeResponse({ entities: [makeEntity()], documentConfidence: 0.9 })),
        rasterizer: new FakeRasterizer(1)
      },
      { persistOutputs: false }
    );
    context = createApiContext(extractor);
  });

  afterEach(async () => {
    await settle(context);
    await fse.remove(tempDir);
  });

  it('answers health checks', async () => {
    const response = await handleRequest(request('GET', '/health'), context);

    expect(response.statusCode).toBe(200);
    expect(JSON.parse(response.body)).toMatchObject({ status: 'healthy' });
  });

  it('describes the API at the root', async () => {
    const response = await handleRequest(request('GET', '/'), context);

    expect(response.statusCode).toBe(200);
    expect(JSON.parse(response.body)).toEqual({ message: 'Design Criteria Extractor API', version: '0.1.0', status: 'running' });
  });

  it('reports the processor behind the extractor', async () => {
    const response = await handleRequest(request('GET', '/api/v1/processor/info'), context);

    expect(response.statusCode).toBe(200);
    expect(JSON.parse(response.body)).toEqual({
      provider: 'fake',
      processorName: 'projects/test-project/locations/us/processors/test-processor',
      location: 'us',
      configured: true
    });
  });

  it('accepts an upload and serves its result once finished', async () => {
    const upload = await handleRequest(
      request('POST', '/api/v1/extract', await makePdf(1), { 'x-filename': 'deck.pdf' }),
      context
    );
    expect(upload.statusCode).toBe(202);
    const { jobId } = JSON.parse(upload.body);

    await settle(context);
    const status = await handleRequest(request('GET', `/api/v1/status/${jobId}`), context);
    const results = await handleRequest(request('GET', `/api/v1/results/${jobId}`), context);

    expect(JSON.parse(status.body)).toMatchObject({ jobId, filename: 'deck.pdf', status: 'completed', progress: 1 });
    expect(JSON.parse(status.body)).not.toHaveProperty('result');
    expect(results.statusCode).toBe(200);
    expect(JSON.parse(results.body)).toMatchObject({
      jobId,
      status: 'completed',
      designCriteria: { confidenceScore: 0.9 }
    });
  });

  it('takes the filename from the query string', async () => {
    const upload = await handleRequest(request('POST', '/api/v1/extract?filename=plan.pdf', await makePdf(1)), context);
    const { jobId } = JSON.parse(upload.body);

    expect(context.registry.require(jobId).filename).toBe('plan.pdf');
  });

  it('rejects uploads without a filename or body', async () => {
    expect((await handleRequest(request('POST', '/api/v1/extract', await makePdf(1)), context)).statusCode).toBe(400);
    expect((await handleRequest(request('POST', '/api/v1/extract?filename=a.pdf'), context)).statusCode).toBe(400);
  });

  it('records a failed upload with its validation message', async () => {
    const upload = await handleRequest(
      request('POST', '/api/v1/extract', Buffer.from('hello'), { 'x-filename': 'fake.pdf' }),
      context
    );
    const { jobId } = JSON.parse(upload.body);
    await settle(context);

    const results = await handleRequest(request('GET', `/api/v1/results/${jobId}`), context);
    expect(JSON.parse(results.body)).toMatchObject({
      status: 'failed',
      errorMessage: 'File is not a valid PDF document: fake.pdf'
    });
  });

  it('reports unfinished jobs as accepted', async () => {
    const job = context.registry.create('queued.pdf');

    const results = await handleRequest(request('GET', `/api/v1/results/${job.jobId}`), context);

    expect(results.statusCode).toBe(202);
    expect(JSON.parse(results.body)).toMatchObject({ jobId: job.jobId, status: 'pending' });
  });

  it('returns 404 for unknown jobs and routes', async () => {
    const status = await handleRequest(request('GET', '/api/v1/status/nope'), context);

    expect(status.statusCode).toBe(404);
    expect(JSON.parse(status.body)).toEqual({ error: 'Job not found: nope' });
    expect((await handleRequest(request('DELETE', '/api/v1/results/nope'), context)).statusCode).toBe(404);
    expect((await handleRequest(request('GET', '/api/v2/extract'), context)).statusCode).toBe(404);
  });

  it('runs a batch of uploaded documents in the background', async () => {
    const files = [
      { filename: 'a.pdf', contentBase64: (await makePdf(1)).toString('base64') },
      { filename: '../fake.pdf', contentBase64: Buffer.from('hello').toString('base64') }
    ];

    const response = await handleRequest(
      request('POST', '/api/v1/batch-extract', Buffer.from(JSON.stringify({ files }))),
      context
    );
    expect(response.statusCode).toBe(202);
    const { jobIds, count } = JSON.parse(response.body);
    expect(count).toBe(2);

    await settle(context);
    expect(context.registry.require(jobIds[0])).toMatchObject({ filename: 'a.pdf', status: 'completed' });
    expect(context.registry.require(jobIds[1])).toMatchObject({
      filename: 'fake.pdf',
      status: 'failed',
      message: 'File is not a valid PDF document: fake.pdf'
    });
  });

  it('does not read paths on the server', async () => {
    const pdfPath = path.join(tempDir, 'a.pdf');
    await fse.writeFile(pdfPath, await makePdf(1));

    const response = await handleRequest(
      request('POST', '/api/v1/batch-extract', Buffer.from(JSON.stringify({ files: [pdfPath] }))),
      context
    );

    expect(response.statusCode).toBe(400);
    expect(context.registry.size).toBe(0);
  });

  it('limits the number of files in a batch', async () => {
    const file = { filename: 'a.pdf', contentBase64: (await makePdf(1)).toString('base64') };
    const files = Array.from({ length: context.maxBatchFiles + 1 }, () => file);

    const response = await handleRequest(
      request('POST', '/api/v1/batch-extract', Buffer.from(JSON.stringify({ files }))),
      context
    );

    expect(response.statusCode).toBe(400);
    expect(JSON.parse(response.body)).toEqual({
      error: `A batch takes at most ${context.maxBatchFiles} files, got ${context.maxBatchFiles + 1}`
    });
  });

  it('rejects malformed batch requests', async () => {
    const notJson = await handleRequest(request('POST', '/api/v1/batch-extract', Buffer.from('{')), context);
    const noFiles = await handleRequest(request('POST', '/api/v1/batch-extract', Buffer.from('{"files": []}')), context);

    expect(notJson.statusCode).toBe(400);
    expect(noFiles.statusCode).toBe(400);
  });
});
