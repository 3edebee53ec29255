/**
 * Selector rule construction and validation.
 *
 * Rules usually come from user input (a settings form, CLI flags), so the
 * CSS path is compiled once up front and rejected here rather than at
 * extraction time.
 */
import { parseHTML } from 'linkedom';
import { z } from 'zod';
import { ConfigError } from '../errors.js';
import type { SelectorRule, Transform } from './types.js';

export const TransformSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('text') }),
  z.object({ kind: z.literal('attribute'), name: z.string().trim().min(1) }),
  z.object({ kind: z.literal('number') }),
  z.object({ kind: z.literal('url'), name: z.string().trim().min(1).default('href') }),
]);

export const SelectorRuleSchema = z.object({
  fieldName: z.string().trim().min(1, 'field name must not be empty'),
  path: z.string().trim().min(1, 'selector path must not be empty'),
  multiple: z.boolean().default(false),
  transform: TransformSchema.optional(),
  required: z.boolean().optional(),
});

export type SelectorRuleInput = z.input<typeof SelectorRuleSchema>;

let probeDocument: Document | null = null;

function getProbeDocument(): Document {
  if (!probeDocument) {
    probeDocument = parseHTML('<!DOCTYPE html><html><head></head><body></body></html>').document;
  }
  return probeDocument;
}

// linkedom completes a dangling combinator or comma instead of rejecting it
const DANGLING_COMBINATOR = /^[>+~,]|[>+~,]$|,\s*,/;

/**
 * Check whether a string is a CSS selector the extractor can evaluate.
 */

export function isValidSelector(path: string): boolean {
  const trimmed = path.trim();
  if (!trimmed || DANGLING_COMBINATOR.test(trimmed)) return false;
  try {
    getProbeDocument().querySelectorAll(path);
    return true;
  } catch {
    return false;
  }
}

/**
 * Build a frozen selector rule from loose input, throwing ConfigError on
 * schema violations or an invalid CSS path.
 */
export function createSelectorRule(input: SelectorRuleInput): SelectorRule {
  const parsed = SelectorRuleSchema.safeParse(input);
  if (!parsed.success) {
    throw ConfigError.fromZod('Invalid selector rule', parsed.error);
  }

  const { fieldName, path, multiple, transform, required } = parsed.data;
  if (!isValidSelector(path)) {
    throw new ConfigError(`Invalid selector rule "${fieldName}"`, [
      `path: "${path}" is not a valid CSS selector`,
    ]);
  }

  const rule: SelectorRule = {
    fieldName,
    path,
    multiple,
    ...(transform ? { transform: Object.freeze(transform) } : {}),
    ...(required ? { required } : {}),
  };
  return Object.freeze(rule);
}

/**
 * Parse the compact rule syntax used on the command line:
 *
 *   name=css[|modifier]...
 *
 * Modifiers: `text`, `number`, `attr:<name>`, `url[:<name>]`, `multiple`, `required`.
 * Example: `links=article a|url|multiple`.
 */
export function parseRuleShorthand(spec: string): SelectorRule {
  const eqIdx = spec.indexOf('=');
  if (eqIdx <= 0) {
    throw new ConfigError(`Invalid field spec "${spec}"`, ['expected name=css[|modifier]...']);
  }

  const fieldName = spec.slice(0, eqIdx).trim();
  const [path, ...modifiers] = spec.slice(eqIdx + 1).split('|');
  let transform: Transform | undefined;
  let multiple = false;
  let required = false;

  for (const rawModifier of modifiers) {
    const modifier = rawModifier.trim();
    const colonIdx = modifier.indexOf(':');
    const name = colonIdx === -1 ? modifier : modifier.slice(0, colonIdx);
    const arg = colonIdx === -1 ? '' : modifier.slice(colonIdx + 1).trim();

    switch (name) {
      case 'text':
        transform = { kind: 'text' };
        break;
      case 'number':
        transform = { kind: 'number' };
        break;
      case 'attr':
        if (!arg) {
          throw new ConfigError(`Invalid field spec "${spec}"`, ['attr requires a name']);
        }
        transform = { kind: 'attribute', name: arg };
        break;
      case 'url':
        transform = { kind: 'url', name: arg || 'href' };
        break;
      case 'multiple':
        multiple = true;
        break;
      case 'required':
        required = true;
        break;
      default:
        throw new ConfigError(`Invalid field spec "${spec}"`, [`unknown modifier "${modifier}"`]);
    }
  }

  return createSelectorRule({ fieldName, path, multiple, transform, required });
}

/** The effective transform of a rule. */
export function ruleTransform(rule: SelectorRule): Transform {
  return rule.transform ?? { kind: 'text' };
}
