import { type GenerateContentParameters, GoogleGenAI } from '@google/genai';
import { z } from 'zod';

import { serializeIssues } from './audit.js';
import type { AppConfig } from './config.js';
import { UnavailableError } from './errors.js';
import { createLogger } from './logger.js';
import type { AuditReport, Issue, Severity } from './types.js';

const log = createLogger('narrative');

export const NO_ISSUES_NARRATIVE =
  'No issues were identified in this model. The audit found no critical, high or medium severity findings.';

/* ---------- System prompt ---------- */
export const SYSTEM_PROMPT = `
You are a financial model audit analyst. You receive the findings of an automated structural audit of a spreadsheet model and explain them.

Do:
- Explain what each finding means in plain language and how it affects the reliability of the model.
- Prioritize findings by materiality and suggest specific remediation steps.
- Reference the actual cell locations given in the findings.
- Say "likely" or "may" for inferences; state only verified facts as certain. Findings marked (reduced confidence) touch a formula that could not be parsed.

Do not:
- Make investment recommendations or valuation conclusions.
- Invent data that is not in the findings.

Structure the answer as:
1. Executive summary (2-3 sentences)
2. Critical issues (if any)
3. High priority items
4. Medium and low priority items
5. Recommended next steps
`.trim();

const SECTIONS: { severity: Severity; title: string }[] = [
  { severity: 'critical', title: 'Critical Issues' },
  { severity: 'high', title: 'High Severity' },
  { severity: 'medium', title: 'Medium Severity' },
  { severity: 'low', title: 'Low Severity' }
];

function findingLine(i: Issue): string {
  const where = i.evidence[0]?.address ?? '?';
  const note = i.confidence === 'reduced' ? ' (reduced confidence)' : '';
  return `- **${i.kind}** at \`${where}\`: ${i.message}${note}`;
}

/** User prompt for the narrative model: findings grouped by severity. */
export function buildFindingsPrompt(report: AuditReport, modelName = report.source): string {
  const lines = [
    `Analyze the following audit findings for the financial model: ${modelName}`,
    `Model Complexity Score: ${report.complexity.score}/5`
  ];
  if (report.complexity.drivers.length) lines.push(`Complexity drivers: ${report.complexity.drivers.join('; ')}`);
  lines.push('', '## Audit Findings');
  for (const { severity, title } of SECTIONS) {
    const group = report.issues.filter(i => i.severity === severity);
    lines.push('', `### ${title} (${group.length})`, ...group.map(findingLine));
  }
  lines.push(
    '',
    '## Structured Findings (JSON)',
    serializeIssues(report),
    '',
    '## Your Task',
    'Provide a narrative analysis of these findings suitable for a senior investment professional.',
    'Focus on materiality and actionability. Be specific about locations and impacts.'
  );
  return lines.join('\n');
}

/* ---------- Narrators ---------- */
export type Narrator = {
  readonly name: string;
  /** Prose explanation of a report's findings. Rejects with UnavailableError. */
  summarize(report: AuditReport, modelName?: string): Promise<string>;
};

// reasoning models wrap their scratchpad in <think> tags
function cleanNarrative(raw: string): string {
  return raw.replace(/<think>[\s\S]*?<\/think>/g, '').trim();
}

type GeminiModels = {
  generateContent(params: GenerateContentParameters): Promise<{ text?: string }>;
};

export class GeminiNarrator implements Narrator {
  readonly name = 'gemini';
  private readonly models: GeminiModels;

  constructor(private readonly model: string, apiKey: string, models?: GeminiModels) {
    this.models = models ?? new GoogleGenAI({ apiKey }).models;
  }

  async summarize(report: AuditReport, modelName?: string): Promise<string> {
    if (!report.issues.length) return NO_ISSUES_NARRATIVE;
    let text: string | undefined;
    try {
      const res = await this.models.generateContent({
        model: this.model,
        contents: [{ role: 'user', parts: [{ text: buildFindingsPrompt(report, modelName) }] }],
        config: { systemInstruction: [{ text: SYSTEM_PROMPT }], temperature: 0 }
      });
      text = res.text;
    } catch (e) {
      throw new UnavailableError(`Gemini request failed: ${(e as Error).message}`, { cause: e });
    }
    if (!text?.trim()) throw new UnavailableError('Gemini returned an empty response');
    return cleanNarrative(text);
  }
}

const ChatResponse = z.object({ message: z.object({ content: z.string() }) });
const GenerateResponse = z.object({ response: z.string() });

function messagesToPrompt(messages: { role: string; content: string }[]) {
  // Simple stitch for /api/generate
  return messages.map(m => `${m.role.toUpperCase()}: ${m.content}`).join('\n\n');
}

export class OllamaNarrator implements Narrator {
  readonly name = 'ollama';

  constructor(private readonly baseUrl: string, private readonly model: string) {}

  private async post(endpoint: string, body: object): Promise<Response> {
    try {
      return await fetch(`${this.baseUrl}${endpoint}`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(body)
      });
    } catch (e) {
      throw new UnavailableError(`Could not reach Ollama at ${this.baseUrl}: ${(e as Error).message}`, { cause: e });
    }
  }

  private async readJson<T>(res: Response, schema: z.ZodType<T>, endpoint: string): Promise<T> {
    if (!res.ok) {
      const txt = await res.text().catch(() => '');
      throw new UnavailableError(`Ollama ${endpoint} ${res.status}${txt ? `: ${txt}` : ''}`);
    }
    const parsed = schema.safeParse(await res.json().catch(() => undefined));
    if (!parsed.success) throw new UnavailableError(`Ollama ${endpoint} returned an unexpected payload`);
    return parsed.data;
  }

  async summarize(report: AuditReport, modelName?: string): Promise<string> {
    if (!report.issues.length) return NO_ISSUES_NARRATIVE;
    const messages = [
      { role: 'system', content: SYSTEM_PROMPT },
      { role: 'user', content: buildFindingsPrompt(report, modelName) }
    ];
    const options = { temperature: 0, num_ctx: 8192 };

    const res = await this.post('/api/chat', { model: this.model, messages, stream: false, options });
    // older daemons only have /api/generate
    if (res.status === 404) {
      const gen = await this.post('/api/generate', { model: this.model, prompt: messagesToPrompt(messages), stream: false, options });
      const data = await this.readJson(gen, GenerateResponse, '/api/generate');
      return cleanNarrative(data.response);
    }
    const data = await this.readJson(res, ChatResponse, '/api/chat');
    return cleanNarrative(data.message.content);
  }
}

/** Narrator for the configured provider; undefined when none is configured. */
export function createNarrator(config: AppConfig['narrative']): Narrator | undefined {
  switch (config.provider) {
    case 'none':
      return undefined;
    case 'gemini':
      if (!config.geminiApiKey) {
        log.warn('NARRATIVE_PROVIDER=gemini but GEMINI_API_KEY is not set; narrative disabled');
        return undefined;
      }
      return new GeminiNarrator(config.geminiModel, config.geminiApiKey);
    case 'ollama':
      return new OllamaNarrator(config.ollamaBaseUrl.replace(/\/+$/, ''), config.ollamaModel);
  }
}
