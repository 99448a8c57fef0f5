import { describe, it, expect, vi, beforeEach } from 'vitest';
import { AIMessage, SystemMessage, HumanMessage } from '@langchain/core/messages';
import { ChatModelAnalysisService } from '../chat-model-analysis-service.js';
import { AnalysisServiceError } from '../analysis-service.js';

const mockInvoke = vi.fn();
const llm = { invoke: mockInvoke } as any;

const request = { prompt: 'Analyze this URL', context: 'url-analysis', timeoutMs: 1000 };

describe('ChatModelAnalysisService', () => {
  const service = new ChatModelAnalysisService(llm, 'gpt-4o-mini', 'openai');

  beforeEach(() => {
    vi.clearAllMocks();
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  it('returns the model text', async () => {
    mockInvoke.mockResolvedValue(new AIMessage('DNS and TLS look fine.'));

    const result = await service.analyze(request);

    expect(result.text).toBe('DNS and TLS look fine.');
    expect(result.model).toBe('gpt-4o-mini');
    expect(service.name).toBe('openai');

    const [messages] = mockInvoke.mock.calls[0];
    expect(messages[0]).toBeInstanceOf(SystemMessage);
    expect(messages[1]).toBeInstanceOf(HumanMessage);
    expect(messages[1].content).toBe('Analyze this URL');
  });

  it('joins text parts of structured content', async () => {
    mockInvoke.mockResolvedValue(
      new AIMessage({
        content: [
          { type: 'text', text: 'Part one. ' },
          { type: 'text', text: 'Part two.' },
        ],
      }),
    );

    const result = await service.analyze(request);
    expect(result.text).toBe('Part one. Part two.');
  });

  it('rejects an empty answer', async () => {
    mockInvoke.mockResolvedValue(new AIMessage('   '));

    await expect(service.analyze(request)).rejects.toBeInstanceOf(AnalysisServiceError);
  });

  it('times out a hanging model call', async () => {
    mockInvoke.mockReturnValue(new Promise(() => {}));

    await expect(service.analyze({ ...request, timeoutMs: 10 })).rejects.toThrow('LLM call timed out after 0.01s');
  });

  it('aborts the model call when the timeout fires', async () => {
    mockInvoke.mockReturnValue(new Promise(() => {}));

    await expect(service.analyze({ ...request, timeoutMs: 10 })).rejects.toMatchObject({ kind: 'timeout' });

    const [, options] = mockInvoke.mock.calls[0];
    expect(options.signal).toBeInstanceOf(AbortSignal);
    expect(options.signal.aborted).toBe(true);
  });

  it('leaves the signal untouched when the model answers in time', async () => {
    mockInvoke.mockResolvedValue(new AIMessage('All checks passed.'));

    await service.analyze(request);

    const [, options] = mockInvoke.mock.calls[0];
    expect(options.signal.aborted).toBe(false);
  });

  it('wraps provider errors', async () => {
    mockInvoke.mockRejectedValue(new Error('429 rate limit exceeded'));

    await expect(service.analyze(request)).rejects.toThrow('LLM API error: 429 rate limit exceeded');
  });
});
