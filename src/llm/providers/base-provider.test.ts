import { describe, it, expect } from 'vitest';
import { AgentError, TransportError } from '../../core/errors.js';
import type { LlmCompletionOptions, LlmCompletionResult, LlmMessage, LlmProviderType } from '../types.js';
import { abortable, BaseProvider } from './base-provider.js';

/** Provider whose SDK call is supplied by the test */
class StubProvider extends BaseProvider {
  readonly providerType: LlmProviderType = 'openai';

  constructor(private readonly sdkCall: () => Promise<string>) {
    super({ temperature: 0.3, maxTokens: 256 }, 'stub-model');
  }

  async chat(_messages: LlmMessage[], options: LlmCompletionOptions = {}): Promise<LlmCompletionResult> {
    const content = await this.request(this.sdkCall, options.signal);
    return { content, finishReason: 'stop' };
  }

  options(options: LlmCompletionOptions) {
    return this.resolveOptions(options);
  }

  args(raw: string | undefined) {
    return this.parseToolArguments(raw, 'get_weather');
  }
}

describe('BaseProvider.request', () => {
  it('wraps SDK failures in a TransportError with the HTTP status', async () => {
    const sdkError = Object.assign(new Error('401 invalid api key'), { status: 401 });
    const provider = new StubProvider(async () => {
      throw sdkError;
    });

    const error = await provider.chat([]).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TransportError);
    expect(error).toMatchObject({
      message: 'openai request failed: 401 invalid api key',
      provider: 'openai',
      status: 401,
      cause: sdkError,
    });
  });

  it('passes planner errors through', async () => {
    const agentError = new AgentError('bad output');
    const provider = new StubProvider(async () => {
      throw agentError;
    });

    await expect(provider.chat([])).rejects.toBe(agentError);
  });

  it('surfaces an abort as the signal reason', async () => {
    const controller = new AbortController();
    const reason = new Error('deadline');
    const provider = new StubProvider(async () => {
      controller.abort(reason);
      throw new Error('Request was aborted.');
    });

    await expect(provider.chat([], { signal: controller.signal })).rejects.toBe(reason);
  });

  it('does not call the SDK with an already aborted signal', async () => {
    let called = false;
    const provider = new StubProvider(async () => {
      called = true;
      return 'never';
    });
    const controller = new AbortController();
    controller.abort(new Error('gone'));

    await expect(provider.chat([], { signal: controller.signal })).rejects.toThrow('gone');
    expect(called).toBe(false);
  });
});

describe('BaseProvider helpers', () => {
  const provider = new StubProvider(async () => 'ok');

  it('falls back to the configured temperature and token cap', () => {
    expect(provider.options({})).toEqual({ temperature: 0.3, maxTokens: 256 });
    expect(provider.options({ temperature: 0 })).toEqual({ temperature: 0, maxTokens: 256 });
    expect(provider.getModel()).toBe('stub-model');
  });

  it('parses tool arguments', () => {
    expect(provider.args('{"location":"Rome"}')).toEqual({ location: 'Rome' });
    expect(provider.args('')).toEqual({});
    expect(provider.args(undefined)).toEqual({});
  });

  it('rejects arguments that are not a JSON object', () => {
    expect(() => provider.args('{"location":')).toThrow('Model produced malformed arguments for tool "get_weather"');
    expect(() => provider.args('["Rome"]')).toThrow('Model produced non-object arguments for tool "get_weather"');
  });
});

describe('abortable', () => {
  it('settles with the promise when not aborted', async () => {
    const controller = new AbortController();

    await expect(abortable(Promise.resolve('done'), controller.signal)).resolves.toBe('done');
  });

  it('rejects with the reason once aborted', async () => {
    const controller = new AbortController();
    const reason = new Error('stop');
    const pending = abortable(new Promise<string>(() => undefined), controller.signal);

    controller.abort(reason);

    await expect(pending).rejects.toBe(reason);
  });
});
