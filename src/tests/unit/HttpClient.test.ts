import { Readable } from 'stream';
import axios, { AxiosResponse, InternalAxiosRequestConfig } from 'axios';
import { HttpClient } from '../../core/HttpClient';

const CONFIG = {
  userAgent: 'test-agent',
  indexTimeoutMs: 20000,
  probeTimeoutMs: 15000,
  downloadTimeoutMs: 60000
};

function respond(config: InternalAxiosRequestConfig, status: number, data: unknown): AxiosResponse {
  return { data, status, statusText: String(status), headers: {}, config };
}

describe('HttpClient', () => {
  it('devrait récupérer une page texte avec le délai d\'index', async () => {
    const adapter = jest.fn(async (config: InternalAxiosRequestConfig) => respond(config, 200, '<html>index</html>'));
    const client = new HttpClient(CONFIG, axios.create({ adapter }));

    await expect(client.getText('https://feeds.test/')).resolves.toBe('<html>index</html>');

    const [request] = adapter.mock.calls[0] ?? [];
    expect(request?.method).toBe('get');
    expect(request?.timeout).toBe(20000);
    expect(request?.responseType).toBe('text');
  });

  describe('exists', () => {
    it('devrait être vrai seulement sur un 200', async () => {
      const statuses = new Map([
        ['https://feeds.test/a.zip', 200],
        ['https://feeds.test/b.zip', 404],
        ['https://feeds.test/c.zip', 403]
      ]);
      const adapter = jest.fn(async (config: InternalAxiosRequestConfig) =>
        respond(config, statuses.get(config.url ?? '') ?? 500, '')
      );
      const client = new HttpClient(CONFIG, axios.create({ adapter }));

      expect(await client.exists('https://feeds.test/a.zip')).toBe(true);
      expect(await client.exists('https://feeds.test/b.zip')).toBe(false);
      expect(await client.exists('https://feeds.test/c.zip')).toBe(false);
      expect(adapter.mock.calls[0]?.[0].method).toBe('head');
      expect(adapter.mock.calls[0]?.[0].timeout).toBe(15000);
    });

    it('devrait être faux sur une erreur réseau', async () => {
      const adapter = jest.fn(async (): Promise<AxiosResponse> => {
        throw new Error('ECONNREFUSED');
      });
      const client = new HttpClient(CONFIG, axios.create({ adapter }));

      expect(await client.exists('https://feeds.test/a.zip')).toBe(false);
    });
  });

  it('devrait assembler le corps téléchargé en streaming', async () => {
    const adapter = jest.fn(async (config: InternalAxiosRequestConfig) =>
      respond(config, 200, Readable.from([Buffer.from('ab'), Buffer.from('cd')]))
    );
    const client = new HttpClient(CONFIG, axios.create({ adapter }));

    const bytes = await client.download('https://feeds.test/a.zip');

    expect(bytes.toString()).toBe('abcd');
    expect(adapter.mock.calls[0]?.[0].responseType).toBe('stream');
    expect(adapter.mock.calls[0]?.[0].timeout).toBe(60000);
  });

  it('should propagate download errors', async () => {
    const adapter = jest.fn(async (): Promise<AxiosResponse> => {
      throw new Error('socket hang up');
    });
    const client = new HttpClient(CONFIG, axios.create({ adapter }));

    await expect(client.download('https://feeds.test/a.zip')).rejects.toThrow('socket hang up');
  });

  it('should create its own instance with the configured user agent', () => {
    const create = jest.spyOn(axios, 'create');

    new HttpClient(CONFIG);

    expect(create).toHaveBeenCalledWith({ headers: { 'User-Agent': 'test-agent' }, maxRedirects: 5 });
    create.mockRestore();
  });
});
