import { HarvestApiError, EntityResolutionError } from '../errors';
import { collect, paginate } from '../sync/paginator';
import { HarvestClient, parseNextLink, type FetchLike } from './client';

const BASE = 'https://harvest.greenhouse.io/v1/';

interface Reply {
  status?: number;
  body: unknown;
  link?: string;
}

function fakeFetch(replies: Record<string, Reply>) {
  const requests: Array<{ url: string; headers: Headers }> = [];
  const fetch: FetchLike = async (url, init) => {
    requests.push({ url, headers: new Headers(init?.headers) });
    const reply = replies[url];
    if (!reply) {
      throw new Error(`unexpected request ${url}`);
    }
    const headers = new Headers({ 'content-type': 'application/json' });
    if (reply.link) {
      headers.set('link', reply.link);
    }
    const text = typeof reply.body === 'string' ? reply.body : JSON.stringify(reply.body);
    return new Response(text, { status: reply.status ?? 200, headers });
  };
  return { fetch, requests };
}

describe('parseNextLink', () => {
  it('picks the next relation out of a Link header', () => {
    const header =
      '<https://harvest.greenhouse.io/v1/jobs?page=2&per_page=100>; rel="next", ' +
      '<https://harvest.greenhouse.io/v1/jobs?page=9&per_page=100>; rel="last"';
    expect(parseNextLink(header)).toBe('https://harvest.greenhouse.io/v1/jobs?page=2&per_page=100');
  });

  it('keeps commas inside the next URL', () => {
    const header =
      '<https://harvest.greenhouse.io/v1/candidates?page=1&candidate_ids=1,2,3>; rel="prev", ' +
      '<https://harvest.greenhouse.io/v1/candidates?candidate_ids=1,2,3&page=3&per_page=100>; rel="next"';
    expect(parseNextLink(header)).toBe('https://harvest.greenhouse.io/v1/candidates?candidate_ids=1,2,3&page=3&per_page=100');
  });

  it('returns null on the last page', () => {
    expect(parseNextLink('<https://harvest.greenhouse.io/v1/jobs?page=1>; rel="prev"')).toBeNull();
    expect(parseNextLink(null)).toBeNull();
  });
});

describe('HarvestClient', () => {
  it('builds URLs under the base path and skips undefined params', () => {
    const client = new HarvestClient({ apiKey: 'test-key' });
    expect(client.buildUrl('demographics/answers', { per_page: 100, created_after: undefined })).toBe(
      `${BASE}demographics/answers?per_page=100`
    );
  });

  it('appends a trailing slash to a custom base URL', () => {
    const client = new HarvestClient({ apiKey: 'test-key', baseUrl: 'http://localhost:8080/v1' });
    expect(client.buildUrl('jobs')).toBe('http://localhost:8080/v1/jobs');
  });

  it('authenticates with the API key as the basic auth user', async () => {
    const { fetch, requests } = fakeFetch({ [`${BASE}jobs`]: { body: [] } });
    const client = new HarvestClient({ apiKey: 'test-key', fetch });

    await client.open('jobs').get();

    expect(requests[0].headers.get('authorization')).toBe('Basic dGVzdC1rZXk6');
    expect(requests[0].headers.get('accept')).toBe('application/json');
  });

  it('maps catalog names onto Harvest paths', () => {
    const client = new HarvestClient({ apiKey: 'test-key' });
    expect(client.hasResource('interviews')).toBe(true);
    expect(client.hasResource('toString')).toBe(false);
    expect(client.hasRelation('applications', 'interviews')).toBe(true);
    expect(client.hasRelation('offers', 'interviews')).toBe(false);
    expect(() => client.open('widgets')).toThrow(EntityResolutionError);
  });

  it('follows Link headers until there is no next page', async () => {
    const { fetch, requests } = fakeFetch({
      [`${BASE}scheduled_interviews?per_page=100`]: {
        body: [{ id: 1 }, { id: 2 }],
        link: `<${BASE}scheduled_interviews?page=2&per_page=100>; rel="next"`
      },
      [`${BASE}scheduled_interviews?page=2&per_page=100`]: {
        body: [{ id: 3 }]
      }
    });
    const client = new HarvestClient({ apiKey: 'test-key', fetch });

    const result = await collect(paginate(client.open('interviews')));

    expect(result).toEqual([{ id: 1 }, { id: 2 }, { id: 3 }]);
    expect(requests).toHaveLength(2);
  });

  it('keeps paginating when filters contain commas', async () => {
    const { fetch, requests } = fakeFetch({
      [`${BASE}candidates?candidate_ids=1%2C2&per_page=100`]: {
        body: [{ id: 1 }],
        link: `<${BASE}candidates?candidate_ids=1,2&page=2&per_page=100>; rel="next"`
      },
      [`${BASE}candidates?candidate_ids=1,2&page=2&per_page=100`]: { body: [{ id: 2 }] }
    });
    const client = new HarvestClient({ apiKey: 'test-key', fetch });

    const result = await collect(paginate(client.open('candidates'), [], { candidate_ids: '1,2' }));

    expect(result).toEqual([{ id: 1 }, { id: 2 }]);
    expect(requests).toHaveLength(2);
  });

  it('opens related resources scoped to the parent id', async () => {
    const { fetch, requests } = fakeFetch({
      [`${BASE}applications?per_page=100`]: { body: [{ id: 42 }] },
      [`${BASE}applications/42/scheduled_interviews?per_page=100`]: { body: [{ id: 7, status: 'scheduled' }] }
    });
    const client = new HarvestClient({ apiKey: 'test-key', fetch });

    const result = await collect(paginate(client.open('applications'), ['interviews']));

    expect(result).toEqual([{ id: 7, status: 'scheduled' }]);
    expect(requests.map(r => r.url)).toEqual([
      `${BASE}applications?per_page=100`,
      `${BASE}applications/42/scheduled_interviews?per_page=100`
    ]);
  });

  it('rejects relations the resource does not have', () => {
    const client = new HarvestClient({ apiKey: 'test-key' });
    expect(() => client.open('offers').related(1, 'openings')).toThrow(EntityResolutionError);
  });

  describe('errors', () => {
    it('classifies 403 responses as forbidden and keeps the API message', async () => {
      const { fetch } = fakeFetch({
        [`${BASE}offers`]: {
          status: 403,
          body: { message: 'This API Key does not have permission for this endpoint' }
        }
      });
      const client = new HarvestClient({ apiKey: 'test-key', fetch });

      const failure = await client.open('offers').get().catch((error: unknown) => error);

      expect(failure).toBeInstanceOf(HarvestApiError);
      expect(failure).toMatchObject({
        kind: 'forbidden',
        status: 403,
        url: `${BASE}offers`,
        message: 'This API Key does not have permission for this endpoint'
      });
    });

    it('falls back to the status line when the body is not JSON', async () => {
      const { fetch } = fakeFetch({ [`${BASE}users`]: { status: 502, body: '<html>Bad gateway</html>' } });
      const client = new HarvestClient({ apiKey: 'test-key', fetch });

      await expect(client.open('users').get()).rejects.toMatchObject({
        kind: 'server',
        message: 'Greenhouse API error: 502'
      });
    });

    it('classifies authentication and rate limit failures', async () => {
      const { fetch } = fakeFetch({
        [`${BASE}jobs`]: { status: 401, body: { message: 'Invalid Basic Auth credentials' } },
        [`${BASE}users`]: { status: 429, body: '' }
      });
      const client = new HarvestClient({ apiKey: 'test-key', fetch });

      await expect(client.open('jobs').get()).rejects.toMatchObject({ kind: 'unauthorized' });
      await expect(client.open('users').get()).rejects.toMatchObject({ kind: 'rate_limited' });
    });

    it('rejects a response that is not a list of records', async () => {
      const { fetch } = fakeFetch({ [`${BASE}jobs`]: { body: { id: 1 } } });
      const client = new HarvestClient({ apiKey: 'test-key', fetch });

      await expect(client.open('jobs').get()).rejects.toThrow(`Expected a JSON array of records from ${BASE}jobs`);
    });

    it('clears the cursor when a page request fails', async () => {
      const { fetch } = fakeFetch({
        [`${BASE}jobs?per_page=100`]: { body: [{ id: 1 }], link: `<${BASE}jobs?page=2>; rel="next"` },
        [`${BASE}jobs?page=2`]: { status: 500, body: '' }
      });
      const client = new HarvestClient({ apiKey: 'test-key', fetch });
      const jobs = client.open('jobs');

      await jobs.get({ per_page: 100 });
      expect(jobs.recordsRemaining).toBe(true);
      await expect(jobs.getNext()).rejects.toBeInstanceOf(HarvestApiError);
      expect(jobs.recordsRemaining).toBe(false);
    });
  });
});
