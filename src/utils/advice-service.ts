import type { AdviceRequest, AdviceService } from '../types.js';
import { ProviderError } from './errors.js';
import { type FetchWithTimeout, readErrorMessage } from './http-client.js';
import { ChatCompletionSchema, formatZodIssues } from './validation.js';

export const ADVICE_SYSTEM_PROMPT = 'You are a travel assistant that provides smart suggestions.';

interface CreateAdviceServiceOptions {
  fetchWithTimeout: FetchWithTimeout;
  apiKey: string;
  apiUrl: string;
  model: string;
  timeoutMs: number;
}

export const formatTripDate = (date: Date): string =>
  date.toLocaleDateString('en-US', { weekday: 'long', year: 'numeric', month: 'long', day: 'numeric' });

export const buildAdvicePrompt = ({ origin, destination, date }: AdviceRequest): string =>
  `I am planning a trip from ${origin} to ${destination} on ${formatTripDate(date)}. ` +
  'Suggest useful things to carry, highlight potential weather issues, and warn me if any route hazards exist.';

export const createAdviceService = ({
  fetchWithTimeout,
  apiKey,
  apiUrl,
  model,
  timeoutMs,
}: CreateAdviceServiceOptions): AdviceService => {
  const getAdvice = async (request: AdviceRequest): Promise<string> => {
    if (!apiKey) {
      throw new ProviderError('advice', 'OpenAI API key is not configured.');
    }

    const body = JSON.stringify({
      model,
      messages: [
        { role: 'system', content: ADVICE_SYSTEM_PROMPT },
        { role: 'user', content: buildAdvicePrompt(request) },
      ],
    });

    let response: Response;
    try {
      response = await fetchWithTimeout(
        apiUrl,
        {
          method: 'POST',
          headers: {
            'Content-Type': 'application/json',
            Authorization: `Bearer ${apiKey}`,
          },
          body,
        },
        timeoutMs,
      );
    } catch (error) {
      throw new ProviderError('advice', `AI API request failed: ${readErrorMessage(error)}`);
    }

    const rawBody = await response.text();
    if (!response.ok) {
      throw new ProviderError('advice', `AI API error: ${rawBody}`, response.status);
    }

    let payload: unknown;
    try {
      payload = JSON.parse(rawBody);
    } catch {
      throw new ProviderError('advice', 'AI API returned invalid JSON.', response.status);
    }

    const parsed = ChatCompletionSchema.safeParse(payload);
    if (!parsed.success) {
      throw new ProviderError('advice', formatZodIssues(parsed.error, 'AI API returned an unexpected payload'), response.status);
    }
    const content = parsed.data.choices[0].message.content;
    if (!content || !content.trim()) {
      throw new ProviderError('advice', 'AI API returned an empty response.', response.status);
    }
    return content;
  };

  return { getAdvice };
};
