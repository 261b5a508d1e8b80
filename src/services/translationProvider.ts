import { z } from 'zod';
import type { AppConfig } from '../config';
import { TranslationProviderError } from '../errors';

export interface TranslateOptions {
  source: string;
  target: string;
}

export interface TranslationProvider {
  readonly name: string;
  translate(text: string, options: TranslateOptions): Promise<string>;
}

export class OfflineTranslationProvider implements TranslationProvider {
  readonly name = 'offline';

  async translate(text: string, options: TranslateOptions): Promise<string> {
    return `[Translated from ${options.source} to ${options.target}]: ${text}`;
  }
}

const responseSchema = z.object({
  data: z.object({
    translations: z.object({
      translatedText: z.string().min(1)
    })
  })
});

export interface HttpTranslationProviderOptions {
  url: string;
  apiKey: string;
  host: string;
  timeoutMs: number;
  fetchImpl?: typeof fetch;
}

function isTimeout(err: unknown): boolean {
  return err instanceof Error && (err.name === 'TimeoutError' || err.name === 'AbortError');
}

export class HttpTranslationProvider implements TranslationProvider {
  readonly name = 'http';
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: HttpTranslationProviderOptions) {
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async translate(text: string, options: TranslateOptions): Promise<string> {
    let response: Response;
    try {
      response = await this.fetchImpl(this.options.url, {
        method: 'POST',
        headers: {
          'content-type': 'application/json',
          'x-rapidapi-key': this.options.apiKey,
          'x-rapidapi-host': this.options.host
        },
        body: JSON.stringify({ q: text, source: options.source, target: options.target }),
        signal: AbortSignal.timeout(this.options.timeoutMs)
      });
    } catch (err) {
      if (isTimeout(err)) {
        throw new TranslationProviderError('Timeout', 'Translation service timeout');
      }
      throw new TranslationProviderError(
        'Unavailable',
        `Translation service unavailable: ${err instanceof Error ? err.message : String(err)}`
      );
    }

    if (!response.ok) {
      throw new TranslationProviderError(
        'Unavailable',
        `Translation service unavailable: upstream status ${response.status}`
      );
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (err) {
      if (isTimeout(err)) {
        throw new TranslationProviderError('Timeout', 'Translation service timeout');
      }
      throw new TranslationProviderError('MalformedResponse', 'Translation response is not JSON');
    }

    const parsed = responseSchema.safeParse(body);
    if (!parsed.success) {
      throw new TranslationProviderError(
        'MalformedResponse',
        'Failed to parse translation response'
      );
    }
    return parsed.data.data.translations.translatedText;
  }
}

export function createTranslationProvider(
  config: Pick<AppConfig, 'translation'>,
  fetchImpl?: typeof fetch
): TranslationProvider {
  const { translation } = config;
  if (translation.offline || !translation.apiKey) {
    return new OfflineTranslationProvider();
  }
  return new HttpTranslationProvider({
    url: translation.apiUrl,
    apiKey: translation.apiKey,
    host: translation.apiHost,
    timeoutMs: translation.timeoutMs,
    fetchImpl
  });
}
