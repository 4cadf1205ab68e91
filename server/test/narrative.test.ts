import { afterEach, describe, expect, it, vi } from 'vitest';

import { auditSnapshot } from '../src/audit.js';
import type { AppConfig } from '../src/config.js';
import { UnavailableError } from '../src/errors.js';
import {
  GeminiNarrator,
  NO_ISSUES_NARRATIVE,
  OllamaNarrator,
  SYSTEM_PROMPT,
  buildFindingsPrompt,
  createNarrator
} from '../src/narrative.js';
import { CYCLE, snapshotOf } from './helpers.js';

const report = auditSnapshot(snapshotOf(CYCLE, 'loop.xlsx'));
const clean = auditSnapshot(snapshotOf({ Sheet1: { A1: 1 } }));

const NARRATIVE: AppConfig['narrative'] = {
  provider: 'none',
  geminiModel: 'gemini-test',
  ollamaBaseUrl: 'http://ollama.test:11434/',
  ollamaModel: 'llama-test'
};

const json = (body: unknown, status = 200) =>
  new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('buildFindingsPrompt', () => {
  it('groups findings by severity and embeds them as JSON', () => {
    const lines = buildFindingsPrompt(report).split('\n');
    expect(lines.slice(0, 12)).toEqual([
      'Analyze the following audit findings for the financial model: loop.xlsx',
      'Model Complexity Score: 3/5',
      'Complexity drivers: formula density 100% > 80%',
      '',
      '## Audit Findings',
      '',
      '### Critical Issues (0)',
      '',
      '### High Severity (1)',
      '- **circular-reference** at `Sheet1!A1`: Circular reference through 2 cell(s): Sheet1!A1, Sheet1!B1',
      '',
      '### Medium Severity (0)'
    ]);
    expect(lines).toContain('## Structured Findings (JSON)');
    expect(lines[lines.length - 1]).toBe('Focus on materiality and actionability. Be specific about locations and impacts.');
  });

  it('uses the given model name', () => {
    expect(buildFindingsPrompt(report, 'Project Alpha').split('\n')[0]).toBe(
      'Analyze the following audit findings for the financial model: Project Alpha'
    );
  });
});

describe('OllamaNarrator', () => {
  const narrator = new OllamaNarrator('http://ollama.test:11434', 'llama-test');

  it('does not call the model when there is nothing to explain', async () => {
    const fetchMock = vi.fn();
    vi.stubGlobal('fetch', fetchMock);
    await expect(narrator.summarize(clean)).resolves.toBe(NO_ISSUES_NARRATIVE);
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('posts a chat request and strips reasoning tags from the answer', async () => {
    const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) =>
      json({ message: { content: '<think>scratch</think>\nThe model has one loop.' } })
    );
    vi.stubGlobal('fetch', fetchMock);

    await expect(narrator.summarize(report)).resolves.toBe('The model has one loop.');
    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('http://ollama.test:11434/api/chat');
    const body = JSON.parse(String(init?.body));
    expect(body.model).toBe('llama-test');
    expect(body.stream).toBe(false);
    expect(body.messages[0]).toEqual({ role: 'system', content: SYSTEM_PROMPT });
  });

  it('falls back to the generate endpoint on 404', async () => {
    const fetchMock = vi
      .fn()
      .mockResolvedValueOnce(json({ error: 'not found' }, 404))
      .mockResolvedValueOnce(json({ response: 'One circular chain.' }));
    vi.stubGlobal('fetch', fetchMock);

    await expect(narrator.summarize(report)).resolves.toBe('One circular chain.');
    expect(fetchMock.mock.calls.map(c => c[0])).toEqual([
      'http://ollama.test:11434/api/chat',
      'http://ollama.test:11434/api/generate'
    ]);
  });

  it('reports an unreachable daemon as unavailable', async () => {
    vi.stubGlobal('fetch', vi.fn().mockRejectedValue(new Error('connect ECONNREFUSED')));
    const result = narrator.summarize(report);
    await expect(result).rejects.toBeInstanceOf(UnavailableError);
    await expect(result).rejects.toThrow('Could not reach Ollama at http://ollama.test:11434: connect ECONNREFUSED');
  });

  it('rejects an unexpected payload', async () => {
    vi.stubGlobal('fetch', vi.fn().mockResolvedValue(json({ done: true })));
    await expect(narrator.summarize(report)).rejects.toThrow('Ollama /api/chat returned an unexpected payload');
  });

  it('passes on the status of a failed request', async () => {
    vi.stubGlobal('fetch', vi.fn().mockResolvedValue(new Response('model not loaded', { status: 500 })));
    await expect(narrator.summarize(report)).rejects.toThrow('Ollama /api/chat 500: model not loaded');
  });
});

describe('GeminiNarrator', () => {
  it('sends the findings prompt with the system instruction', async () => {
    const generateContent = vi.fn(async () => ({ text: 'One loop between A1 and B1.' }));
    const narrator = new GeminiNarrator('gemini-test', 'test-secret', { generateContent });

    await expect(narrator.summarize(report)).resolves.toBe('One loop between A1 and B1.');
    expect(generateContent).toHaveBeenCalledWith({
      model: 'gemini-test',
      contents: [{ role: 'user', parts: [{ text: buildFindingsPrompt(report) }] }],
      config: { systemInstruction: [{ text: SYSTEM_PROMPT }], temperature: 0 }
    });
  });

  it('wraps request failures and empty answers', async () => {
    const failing = new GeminiNarrator('gemini-test', 'test-secret', {
      generateContent: vi.fn().mockRejectedValue(new Error('quota exceeded'))
    });
    await expect(failing.summarize(report)).rejects.toThrow('Gemini request failed: quota exceeded');

    const empty = new GeminiNarrator('gemini-test', 'test-secret', { generateContent: vi.fn(async () => ({ text: ' ' })) });
    await expect(empty.summarize(report)).rejects.toThrow('Gemini returned an empty response');
  });
});

describe('createNarrator', () => {
  it('builds the configured provider', () => {
    expect(createNarrator(NARRATIVE)).toBeUndefined();
    expect(createNarrator({ ...NARRATIVE, provider: 'gemini' })).toBeUndefined();
    expect(createNarrator({ ...NARRATIVE, provider: 'gemini', geminiApiKey: 'test-secret' })?.name).toBe('gemini');
    expect(createNarrator({ ...NARRATIVE, provider: 'ollama' })?.name).toBe('ollama');
  });
});
