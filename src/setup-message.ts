import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { dirname, join } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';

export type SetupContext = 'missing' | 'invalid' | 'unknown';

const blockSchema = z.object({
  header: z.string(),
  diagnosis: z.string(),
  step1: z.string(),
});

const messagesSchema = z.object({
  setup: z.object({
    missing: blockSchema,
    invalid: blockSchema,
    unknown: blockSchema,
    config_instructions: z.string(),
    footer: z.string(),
  }),
});

type SetupMessages = z.infer<typeof messagesSchema>;

const __dirname = dirname(fileURLToPath(import.meta.url));
const yamlPath = join(__dirname, '..', 'messages.yaml');

let _cached: SetupMessages | null = null;
function loadMessages(): SetupMessages {
  if (_cached) return _cached;
  _cached = messagesSchema.parse(parseYaml(readFileSync(yamlPath, 'utf-8')));
  return _cached;
}

function detectContext(): SetupContext {
  const hasKey = !!process.env.OPENAI_API_KEY;
  const isOllama = process.env.EMBEDDING_PROVIDER === 'ollama';
  if (!hasKey && !isOllama) return 'missing';
  return 'invalid';
}

/** Markdown shown in place of every tool result while the server runs without a working backend. */
export function getSetupErrorMessage(errorDetail: string, context?: SetupContext): string {
  const ctx = context ?? detectContext();
  const msgs = loadMessages();
  const block = msgs.setup[ctx];

  const header = block.header.replace('{error}', () => errorDetail);
  const diagnosis = block.diagnosis.trim() ? `**Diagnosis:** ${block.diagnosis.trim()}\n\n` : '';

  return (
    `${header}\n\n` +
    diagnosis +
    '## How to fix\n\n' +
    `1. ${block.step1}\n` +
    '2. **Set or update your config** (pick one):\n\n' +
    msgs.setup.config_instructions +
    `3. ${msgs.setup.footer}`
  );
}
