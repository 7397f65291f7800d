import { z } from 'zod';
import { CONFIG_KEYS, DEFAULT_SETTINGS } from './config.types';

const requiredString = z.string().trim().min(1);

const optionalString = (fallback: string) =>
  z
    .string()
    .trim()
    .optional()
    .transform(value => (value ? value : fallback));

const positiveInt = (fallback: number) =>
  z
    .string()
    .trim()
    .optional()
    .transform((value, ctx) => {
      if (!value) {
        return fallback;
      }
      const parsed = Number(value);
      if (!Number.isInteger(parsed) || parsed <= 0) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'must be a positive integer' });
        return z.NEVER;
      }
      return parsed;
    });

/**
 * Comma separated glob list; blank entries are dropped
 */
const patternList = z
  .string()
  .optional()
  .transform(value => {
    const patterns = (value ?? '')
      .split(',')
      .map(pattern => pattern.trim())
      .filter(pattern => pattern.length > 0);
    return patterns.length > 0 ? patterns : [...DEFAULT_SETTINGS.pushPatterns];
  });

/**
 * Raw key/value pairs read from the .env file
 */
export const EnvFileSchema = z.object({
  [CONFIG_KEYS.username]: requiredString,
  [CONFIG_KEYS.token]: requiredString,
  [CONFIG_KEYS.repository]: requiredString,
  [CONFIG_KEYS.localPath]: requiredString,
  [CONFIG_KEYS.commitMessage]: optionalString(DEFAULT_SETTINGS.commitMessage),
  [CONFIG_KEYS.pushPatterns]: patternList,
  [CONFIG_KEYS.remote]: optionalString(DEFAULT_SETTINGS.remote),
  [CONFIG_KEYS.emptyCommitPolicy]: z
    .string()
    .trim()
    .toLowerCase()
    .optional()
    .transform(value => (value ? value : DEFAULT_SETTINGS.emptyCommitPolicy))
    .pipe(z.enum(['succeed', 'fail'])),
  [CONFIG_KEYS.docsDirectory]: optionalString(DEFAULT_SETTINGS.docsDirectory),
  [CONFIG_KEYS.docsCompiler]: optionalString(DEFAULT_SETTINGS.docsCompiler),
  [CONFIG_KEYS.docsPasses]: positiveInt(DEFAULT_SETTINGS.docsPasses),
  [CONFIG_KEYS.commandTimeoutMs]: positiveInt(DEFAULT_SETTINGS.commandTimeoutMs),
  [CONFIG_KEYS.historyLimit]: positiveInt(DEFAULT_SETTINGS.historyLimit),
});
