import { ConfigurationError, loadConfiguration, parseServerAddress, toNestLogLevels } from './configuration';

describe('configuration', () => {
  describe('loadConfiguration', () => {
    it('should apply defaults for an empty environment', () => {
      const config = loadConfiguration({}, '/srv/feedbacker');

      expect(config.environment).toBe('development');
      expect(config.logLevel).toBe('info');
      expect(config.server).toEqual({ host: '0.0.0.0', port: 3000 });
      expect(config.databaseUrl).toBe('sqlite:/srv/feedbacker/data/feedbacker.db');
      expect(config.workspaceRoot).toBe('/srv/feedbacker/tmp/workspaces');
      expect(config.analysis.catalogPath).toBe('/srv/feedbacker/config/analysis-steps.json');
      expect(config.scheduler).toMatchObject({ enabled: true, workerCount: 4, queueCapacity: 100 });
      expect(config.scheduler.fetchRetry).toMatchObject({ maxAttempts: 3, baseDelayMs: 1000, retryableKinds: ['NetworkError'] });
      expect(config.scheduler.storeRetry).toMatchObject({ maxAttempts: 3, retryableKinds: ['PersistenceError'] });
      expect(config.ssh).toEqual({
        keyPath: null,
        knownHostsPath: null,
        strictHostKeyChecking: 'accept-new',
        connectTimeoutSeconds: 15,
      });
    });

    it('should read overrides from the environment', () => {
      const config = loadConfiguration({
        ENVIRONMENT: 'production',
        LOG_LEVEL: 'DEBUG',
        SERVER_ADDRESS: '127.0.0.1:8080',
        DATABASE_URL: 'sqlite::memory:',
        WORKER_POOL_SIZE: '8',
        QUEUE_CAPACITY: '0',
        FETCH_MAX_ATTEMPTS: '5',
        RETRY_JITTER: '0',
        SCHEDULER_ENABLED: 'false',
        SSH_KEY_PATH: '/home/feedbacker/.ssh/id_ed25519',
        SSH_STRICT_HOST_KEY_CHECKING: 'yes',
      });

      expect(config.environment).toBe('production');
      expect(config.logLevel).toBe('debug');
      expect(config.server).toEqual({ host: '127.0.0.1', port: 8080 });
      expect(config.databaseUrl).toBe('sqlite::memory:');
      expect(config.scheduler.workerCount).toBe(8);
      expect(config.scheduler.queueCapacity).toBe(0);
      expect(config.scheduler.enabled).toBe(false);
      expect(config.scheduler.fetchRetry.maxAttempts).toBe(5);
      expect(config.scheduler.fetchRetry.jitterRatio).toBe(0);
      expect(config.ssh.keyPath).toBe('/home/feedbacker/.ssh/id_ed25519');
      expect(config.ssh.strictHostKeyChecking).toBe('yes');
    });

    it('should treat blank values as unset', () => {
      expect(loadConfiguration({ WORKER_POOL_SIZE: '  ' }).scheduler.workerCount).toBe(4);
    });

    it('should name the variable in validation errors', () => {
      expect(() => loadConfiguration({ WORKER_POOL_SIZE: '0' })).toThrow(
        'Invalid WORKER_POOL_SIZE value: "0" (expected an integer between 1 and 256)',
      );
      expect(() => loadConfiguration({ FETCH_TIMEOUT_MS: '1.5' })).toThrow('Invalid FETCH_TIMEOUT_MS value');
      expect(() => loadConfiguration({ ANALYSIS_TIMEOUT_MS: '3000000000' })).toThrow(
        'Invalid ANALYSIS_TIMEOUT_MS value: "3000000000" (expected an integer between 1 and 2147483647)',
      );
      expect(() => loadConfiguration({ RETRY_MAX_DELAY_MS: '2147483648' })).toThrow('Invalid RETRY_MAX_DELAY_MS value');
      expect(() => loadConfiguration({ ANALYSIS_KILL_GRACE_MS: '9999999999' })).toThrow('Invalid ANALYSIS_KILL_GRACE_MS value');
      expect(loadConfiguration({ FETCH_TIMEOUT_MS: '2147483647' }).scheduler.fetchTimeoutMs).toBe(2147483647);
      expect(() => loadConfiguration({ SCHEDULER_ENABLED: 'maybe' })).toThrow('Invalid SCHEDULER_ENABLED value');
      expect(() => loadConfiguration({ LOG_LEVEL: 'loud' })).toThrow(
        'Invalid LOG_LEVEL value: "loud" (expected one of error, warn, info, debug, verbose)',
      );
      expect(() => loadConfiguration({ RETRY_JITTER: '2' })).toThrow(ConfigurationError);
    });

    it('should reject a max retry delay below the base delay', () => {
      expect(() => loadConfiguration({ RETRY_BASE_DELAY_MS: '5000', RETRY_MAX_DELAY_MS: '100' })).toThrow(
        'must be >= RETRY_BASE_DELAY_MS 5000',
      );
    });
  });

  describe('parseServerAddress', () => {
    it('should parse the supported forms', () => {
      expect(parseServerAddress('0.0.0.0:3000')).toEqual({ host: '0.0.0.0', port: 3000 });
      expect(parseServerAddress(':4000')).toEqual({ host: '0.0.0.0', port: 4000 });
      expect(parseServerAddress('5000')).toEqual({ host: '0.0.0.0', port: 5000 });
      expect(parseServerAddress('[::1]:6000')).toEqual({ host: '::1', port: 6000 });
    });

    it('should reject bad ports', () => {
      expect(() => parseServerAddress('localhost:http')).toThrow('Invalid SERVER_ADDRESS value');
      expect(() => parseServerAddress('localhost:70000')).toThrow('Invalid SERVER_ADDRESS value');
    });
  });

  describe('toNestLogLevels', () => {
    it('should include every level up to the chosen one', () => {
      expect(toNestLogLevels('error')).toEqual(['fatal', 'error']);
      expect(toNestLogLevels('info')).toEqual(['fatal', 'error', 'warn', 'log']);
      expect(toNestLogLevels('verbose')).toEqual(['fatal', 'error', 'warn', 'log', 'debug', 'verbose']);
    });
  });
});
