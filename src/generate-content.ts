import { z } from 'zod';
import type { GenAIClient } from './client';
import {
  InvalidArgumentError,
  MalformedResponseError,
  isRequestError,
  type RequestError,
  type Result,
} from './errors';
import { formatIssues } from './file-descriptor';
import { attempt, expectOk } from './request';
import type {
  Content,
  FileDescriptor,
  GenerateContentInput,
  GenerateContentResponse,
  Part,
} from './types';

const inlineDataSchema = z.object({
  mimeType: z.string(),
  data: z.string(),
});

const candidateSchema = z.object({
  content: z
    .object({
      parts: z
        .array(
          z.object({
            text: z.string().optional(),
            inlineData: inlineDataSchema.optional(),
          })
        )
        .default([]),
      role: z.string().default('model'),
    })
    .default({}),
  finishReason: z.string().default('UNSPECIFIED'),
  index: z.number().int().default(0),
  safetyRatings: z
    .array(z.object({ category: z.string().optional(), probability: z.string().optional() }))
    .default([]),
});

const usageMetadataSchema = z.object({
  promptTokenCount: z.number().int().default(0),
  candidatesTokenCount: z.number().int().default(0),
  totalTokenCount: z.number().int().default(0),
});

const generateContentResponseSchema = z.object({
  candidates: z.array(candidateSchema).default([]),
  usageMetadata: usageMetadataSchema.optional(),
});

/**
 * Reference an uploaded file in a request without sending its bytes again
 */
export function fileDataPart(file: Pick<FileDescriptor, 'mimeType' | 'uri'>): Part {
  return { fileData: { mimeType: file.mimeType, fileUri: file.uri } };
}

export function toContents(input: GenerateContentInput): Content[] {
  if (typeof input === 'string') {
    return [{ role: 'user', parts: [{ text: input }] }];
  }
  return input;
}

/**
 * Normalize a generation response, filling the defaults the service omits
 *
 * @throws MalformedResponseError when the payload is not a response object
 */
export function toGenerateContentResponse(payload: unknown): GenerateContentResponse {
  const parsed = generateContentResponseSchema.safeParse(payload);
  if (!parsed.success) {
    throw new MalformedResponseError('Invalid generation response', formatIssues(parsed.error));
  }
  return parsed.data;
}

/**
 * Generate content with a model
 *
 * @param model - Model id, with or without the `models/` prefix
 * @param input - A prompt, or contents mixing text and uploaded files
 *
 * @example
 * ```typescript
 * const upload = await uploadFile(client, 'report.pdf');
 * if (upload.success) {
 *   const result = await generateContent(client, 'gemini-1.5-flash', [
 *     { role: 'user', parts: [fileDataPart(upload.data), { text: 'Summarize this report' }] },
 *   ]);
 * }
 * ```
 */
export function generateContent(
  client: GenAIClient,
  model: string,
  input: GenerateContentInput
): Promise<Result<GenerateContentResponse, RequestError>> {
  return attempt(async () => {
    const modelId = model.trim().replace(/^models\//, '');
    if (modelId === '') {
      throw new InvalidArgumentError('model must not be empty');
    }

    const contents = toContents(input);
    if (contents.length === 0) {
      throw new InvalidArgumentError('contents must not be empty');
    }

    const response = await client.transport.send({
      method: 'POST',
      url: client.apiEndpoint(`models/${modelId}:generateContent`),
      query: client.authQuery(),
      json: { contents },
    });

    return toGenerateContentResponse(expectOk(response, client.logger));
  }, isRequestError);
}
