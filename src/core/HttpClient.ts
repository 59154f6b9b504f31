// Client HTTP du flux: index texte, sonde HEAD, téléchargement en streaming
import axios, { AxiosInstance } from 'axios';
import type { Readable } from 'stream';

export interface HttpClientConfig {
  userAgent: string;
  indexTimeoutMs: number;
  probeTimeoutMs: number;
  downloadTimeoutMs: number;
}

export class HttpClient {
  private readonly instance: AxiosInstance;

  constructor(
    private readonly config: HttpClientConfig,
    instance?: AxiosInstance
  ) {
    this.instance = instance ?? axios.create({
      headers: { 'User-Agent': config.userAgent },
      maxRedirects: 5
    });
  }

  /**
   * GET d'une page texte (index de répertoire); lève sur statut non-2xx
   */
  async getText(url: string): Promise<string> {
    const response = await this.instance.get<string>(url, {
      responseType: 'text',
      timeout: this.config.indexTimeoutMs
    });
    return typeof response.data === 'string' ? response.data : String(response.data);
  }

  /**
   * Sonde d'existence légère: vrai seulement sur un 200 (redirections suivies)
   */
  async exists(url: string): Promise<boolean> {
    try {
      const response = await this.instance.head(url, {
        timeout: this.config.probeTimeoutMs,
        validateStatus: () => true
      });
      return response.status === 200;
    } catch {
      // Erreur réseau = fichier considéré absent
      return false;
    }
  }

  /**
   * Télécharge le corps en streaming et retourne tous les octets
   */
  async download(url: string): Promise<Buffer> {
    const response = await this.instance.get<Readable>(url, {
      responseType: 'stream',
      timeout: this.config.downloadTimeoutMs
    });

    const chunks: Buffer[] = [];
    for await (const chunk of response.data) {
      chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
    }
    return Buffer.concat(chunks);
  }
}
