import { EntityCatalog } from '../catalog/entities';
import { HarvestApiError } from '../errors';
import type { Logger } from '../logger';
import { FakeDirectory } from '../test-utils';
import { AccessProber, NO_PERMISSIONS_MESSAGE } from './prober';

const FORBIDDEN_MESSAGE = 'This API Key does not have permission for this endpoint';

function forbidden(resource: string): HarvestApiError {
  return new HarvestApiError(FORBIDDEN_MESSAGE, 403, `https://example.test/${resource}`);
}

function recordingLogger(): Logger & { lines: string[] } {
  const lines: string[] = [];
  return {
    lines,
    debug: message => lines.push(`debug ${message}`),
    info: message => lines.push(`info ${message}`),
    warn: message => lines.push(`warn ${message}`),
    error: message => lines.push(`error ${message}`)
  };
}

function setup(options: { failures?: Record<string, Error>; names?: string[] } = {}) {
  const directory = new FakeDirectory({
    pages: {},
    failures: options.failures,
    relations: { jobs: ['openings'] }
  });
  const catalog = new EntityCatalog(directory, options.names ?? ['jobs', 'offers', 'users', 'jobs.openings']);
  const logger = recordingLogger();
  return { directory, logger, prober: new AccessProber(catalog, directory, logger) };
}

describe('AccessProber', () => {
  describe('probe', () => {
    it('reports an entity as accessible when the first page loads', async () => {
      const { prober, directory } = setup();
      await expect(prober.probe('jobs')).resolves.toBe(true);
      expect(directory.calls).toEqual([{ method: 'get', key: 'jobs', params: undefined }]);
    });

    it('probes the root collection of a nested entity', async () => {
      const { prober, directory } = setup();
      await prober.probe('jobs.openings');
      expect(directory.keysRequested()).toEqual(['jobs']);
    });

    it('reports a forbidden entity as inaccessible and warns', async () => {
      const { prober, logger } = setup({ failures: { offers: forbidden('offers') } });
      await expect(prober.probe('offers')).resolves.toBe(false);
      expect(logger.lines).toEqual([`warn Endpoint 'offers' error: ${FORBIDDEN_MESSAGE}`]);
    });

    it('rethrows any other failure', async () => {
      const failure = new HarvestApiError('Invalid Basic Auth credentials', 401, 'https://example.test/jobs');
      const { prober } = setup({ failures: { jobs: failure } });
      await expect(prober.probe('jobs')).rejects.toBe(failure);
    });

    it('does not treat a forbidden-looking message on another status as forbidden', async () => {
      const { prober } = setup({
        failures: { jobs: new HarvestApiError(FORBIDDEN_MESSAGE, 500, 'https://example.test/jobs') }
      });
      await expect(prober.probe('jobs')).rejects.toThrow(FORBIDDEN_MESSAGE);
    });
  });

  describe('getAccessibleEndpoints', () => {
    it('returns the catalog order minus forbidden entities', async () => {
      const { prober, logger } = setup({
        failures: { offers: forbidden('offers'), users: forbidden('users') }
      });

      await expect(prober.getAccessibleEndpoints()).resolves.toEqual(['jobs', 'jobs.openings']);
      expect(logger.lines[logger.lines.length - 1]).toBe('info API key has access to 2 endpoints: jobs, jobs.openings');
    });

    it('stops probing at the first non-permission error', async () => {
      const { prober, directory } = setup({
        failures: { offers: new HarvestApiError('Greenhouse API error: 500', 500, 'https://example.test/offers') }
      });

      await expect(prober.getAccessibleEndpoints()).rejects.toThrow('Greenhouse API error: 500');
      expect(directory.keysRequested()).toEqual(['jobs', 'offers']);
    });

    it('probes again on every call', async () => {
      const { prober, directory } = setup({ names: ['jobs'] });
      await prober.getAccessibleEndpoints();
      await prober.getAccessibleEndpoints();
      expect(directory.keysRequested()).toEqual(['jobs', 'jobs']);
    });
  });

  describe('healthCheck', () => {
    it('is alive when at least one entity is readable', async () => {
      const { prober } = setup({ failures: { offers: forbidden('offers') } });
      await expect(prober.healthCheck()).resolves.toEqual({ alive: true, message: null });
    });

    it('asks for permissions when nothing is readable', async () => {
      const { prober } = setup({
        names: ['offers', 'users'],
        failures: { offers: forbidden('offers'), users: forbidden('users') }
      });
      await expect(prober.healthCheck()).resolves.toEqual({ alive: false, message: NO_PERMISSIONS_MESSAGE });
    });

    it('reports a fatal probe error instead of throwing', async () => {
      const { prober } = setup({
        failures: { jobs: new HarvestApiError('Invalid Basic Auth credentials', 401, 'https://example.test/jobs') }
      });
      await expect(prober.healthCheck()).resolves.toEqual({
        alive: false,
        message: 'Invalid Basic Auth credentials'
      });
    });
  });

  describe('filterStreams', () => {
    it('keeps accessible descriptors in their declared order', async () => {
      const { prober } = setup({ failures: { offers: forbidden('offers') } });
      const declared = [{ name: 'users' }, { name: 'offers' }, { name: 'jobs.openings' }, { name: 'jobs' }];

      const result = await prober.filterStreams(declared);

      expect(result.map(s => s.name)).toEqual(['users', 'jobs.openings', 'jobs']);
    });

    it('drops descriptors that are not in the catalog', async () => {
      const { prober } = setup({ names: ['jobs'] });
      const result = await prober.filterStreams([{ name: 'jobs' }, { name: 'payments' }]);
      expect(result).toEqual([{ name: 'jobs' }]);
    });
  });
});
