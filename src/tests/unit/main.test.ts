import { buildConfig } from '../../config/env';
import {
  ArchiveError,
  ConfigError,
  DiscoveryError,
  FetchError,
  ReconciliationError,
  RunLockError
} from '../../core/errors';
import { applyCliOverrides, EXIT_CODES, exitCodeFor, main } from '../../main';

describe('main', () => {
  const base = buildConfig({ FEED_BASE_URL: 'https://a.test/', SQLITE_PATH: ':memory:' });

  beforeEach(() => {
    jest.clearAllMocks();
  });

  describe('applyCliOverrides', () => {
    it('devrait faire primer les options sur l\'environnement', () => {
      const { config, help } = applyCliOverrides(base, [
        '--base-url',
        'https://b.test/',
        '--retries',
        '3',
        '--retry-seconds',
        '0',
        '--save-zip-dir',
        '/tmp/raw',
        '--export-json-dir',
        '/tmp/json',
        '--db',
        '/tmp/catalog.db',
        '--no-mark-sold'
      ]);

      expect(help).toBe(false);
      expect(config).toMatchObject({
        FEED_BASE_URL: 'https://b.test/',
        FETCH_MAX_ATTEMPTS: 3,
        FETCH_RETRY_SECONDS: 0,
        SAVE_ZIP_DIR: '/tmp/raw',
        EXPORT_JSON_DIR: '/tmp/json',
        SQLITE_PATH: '/tmp/catalog.db',
        MARK_SOLD: false
      });
    });

    it('devrait garder la configuration sans options', () => {
      expect(applyCliOverrides(base, []).config).toEqual(base);
    });

    it('devrait rejeter une valeur numérique invalide', () => {
      expect(() => applyCliOverrides(base, ['--retries', 'beaucoup'])).toThrow(ConfigError);
    });

    it('should reject unknown options', () => {
      expect(() => applyCliOverrides(base, ['--inconnu'])).toThrow();
    });
  });

  describe('exitCodeFor', () => {
    it('devrait associer chaque erreur fatale à son code de sortie', () => {
      expect(exitCodeFor(new FetchError(12, new Error('x')))).toBe(2);
      expect(exitCodeFor(new DiscoveryError('https://a.test/', []))).toBe(2);
      expect(exitCodeFor(new ArchiveError('zip illisible'))).toBe(2);
      expect(exitCodeFor(new ReconciliationError(new Error('x')))).toBe(3);
      expect(exitCodeFor(new RunLockError('autre', '2024-03-15T00:00:00.000Z'))).toBe(4);
      expect(exitCodeFor(new Error('inattendue'))).toBe(1);
    });
  });

  describe('main', () => {
    it('devrait afficher l\'aide et sortir avec 0', async () => {
      await expect(main(['--help'], base)).resolves.toBe(EXIT_CODES.OK);
      expect(console.log).toHaveBeenCalledWith(expect.stringContaining('Usage: listing-feed-sync'));
    });

    it('devrait sortir avec 1 sur une option inconnue', async () => {
      await expect(main(['--inconnu'], base)).resolves.toBe(EXIT_CODES.FAILURE);
    });

    it('devrait sortir avec 1 si la configuration est invalide', async () => {
      await expect(main([], buildConfig({ SQLITE_PATH: ':memory:' }))).resolves.toBe(EXIT_CODES.FAILURE);
    });
  });
});
