/**
 * MistralBoundaryDetector.ts
 *
 * Asks a Mistral chat model where the technical sheets of a catalog start and
 * end. The stamped PDF is uploaded, shared through a signed URL and sent along
 * with the structural analysis as context.
 */

import path from 'path';
import fs from 'fs-extra';
import { Mistral } from '@mistralai/mistralai';
import { Config } from '../config';
import { BoundaryDetectionRequest, BoundaryDetector } from '../models/BoundaryDetector';
import { buildDetectionPrompt, TECHNICAL_SHEET_PROMPT } from '../prompts/technicalSheetPrompt';
import { ConfigError, errorMessage, getErrorStatus, MistralApiError, withRetry } from '../utils/errors';
import { componentLogger } from '../utils/logger';

const log = componentLogger('MistralBoundaryDetector');

export type MistralSettings = Config['mistral'];

type ChatCompletion = Awaited<ReturnType<Mistral['chat']['complete']>>;
type ChatChoice = NonNullable<ChatCompletion['choices']>[number];
type MessageContent = ChatChoice['message']['content'];

/**
 * Plain text of an assistant message; text chunks are concatenated, other
 * chunk types ignored
 */
export function messageText(content: MessageContent): string {
  if (typeof content === 'string') {
    return content;
  }
  if (!content) {
    return '';
  }
  return content
    .map(chunk => ('text' in chunk && typeof chunk.text === 'string' ? chunk.text : ''))
    .join('');
}

export class MistralBoundaryDetector implements BoundaryDetector {
  private client: Mistral;

  /**
   * @throws ConfigError if no API key is configured
   */
  constructor(private settings: MistralSettings, private prompt: string = TECHNICAL_SHEET_PROMPT) {
    if (!settings.apiKey) {
      throw new ConfigError('MISTRAL_API_KEY is required for boundary detection');
    }

    this.client = new Mistral({
      apiKey: settings.apiKey,
      timeoutMs: settings.timeoutMs,
    });

    log.debug({ model: settings.model }, 'MistralBoundaryDetector initialized');
  }

  /**
   * Run one detection request
   * @throws MistralApiError once retries are exhausted or on a non-retryable failure
   */
  async detectBoundaries({ pdfPath, analysis }: BoundaryDetectionRequest): Promise<string> {
    const startTime = Date.now();
    const fileName = path.basename(pdfPath);
    const content = await fs.readFile(pdfPath);

    const uploadedFile = await this.call('files.upload', () =>
      this.client.files.upload({
        file: { fileName, content },
        purpose: 'ocr',
      })
    );
    log.info({ fileId: uploadedFile.id, fileName }, 'PDF uploaded');

    const signedUrl = await this.call('files.getSignedUrl', () =>
      this.client.files.getSignedUrl({ fileId: uploadedFile.id })
    );

    const text = buildDetectionPrompt(JSON.stringify(analysis, null, 2), this.prompt);
    const response = await this.call('chat.complete', () =>
      this.client.chat.complete({
        model: this.settings.model,
        messages: [
          {
            role: 'user',
            content: [
              { type: 'text', text },
              { type: 'document_url', documentUrl: signedUrl.url },
            ],
          },
        ],
      })
    );

    const choice = response.choices?.[0];
    if (!choice) {
      throw new MistralApiError('Chat completion returned no choices', 'chat.complete');
    }

    const answer = messageText(choice.message.content);
    log.info(
      { fileName, model: this.settings.model, responseLength: answer.length, elapsedMs: Date.now() - startTime },
      'Boundary detection response received'
    );
    return answer;
  }

  private async call<T>(endpoint: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await withRetry(
        fn,
        this.settings.maxRetries,
        this.settings.retryDelayMs,
        undefined,
        (attempt, error, delayMs) => {
          log.warn({ endpoint, attempt, delayMs, err: error }, 'Mistral API call failed, retrying');
        }
      );
    } catch (error) {
      throw new MistralApiError(errorMessage(error), endpoint, getErrorStatus(error));
    }
  }
}

export default MistralBoundaryDetector;
