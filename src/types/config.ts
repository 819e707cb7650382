import { z } from 'zod';
import { normalizeHashtag } from '@/utils/text';

export const DEFAULT_WELCOME_TEMPLATE =
  'Welcome aboard, {handle}! Glad you introduced yourself. Have a look around, follow a few people, and enjoy the timeline.';

const TRUE_STRINGS = ['true', '1', 'yes', 'on'];
const FALSE_STRINGS = ['false', '0', 'no', 'off'];

// Environment variables arrive as strings ("TRUE", "false", "1"). Anything
// else is left as a string so the boolean check rejects it.
const booleanish = z.preprocess(
  (val) => {
    if (typeof val !== 'string') {
      return val;
    }
    const normalized = val.trim().toLowerCase();
    if (TRUE_STRINGS.includes(normalized)) return true;
    if (FALSE_STRINGS.includes(normalized)) return false;
    return val;
  },
  z.boolean({ invalid_type_error: 'Expected one of true/false, 1/0, yes/no, on/off' })
);

const logLevel = z.preprocess(
  (val) => (typeof val === 'string' ? val.trim().toLowerCase() : val),
  z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'])
);

export const VisibilitySchema = z.enum(['public', 'unlisted', 'private', 'direct']);
export type Visibility = z.infer<typeof VisibilitySchema>;

export const ConfigSchema = z.object({
  server: z.object({
    enabled: booleanish.default(false),
    host: z.string().min(1).default('0.0.0.0'),
    port: z.coerce.number().int().min(1).max(65535).default(3000)
  }),
  logging: z.object({
    level: logLevel.default('info')
  }),
  mastodon: z.object({
    apiBaseUrl: z.string().url(),
    username: z.string().min(1),
    password: z.string().min(1),
    clientId: z.string().min(1),
    clientSecret: z.string().min(1),
    scopes: z.array(z.string().min(1)).min(1).default(['write:statuses'])
  }),
  bot: z.object({
    hashtag: z.string()
      .transform(normalizeHashtag)
      .pipe(z.string().min(1, 'Hashtag must not be empty')),
    dryRun: booleanish.default(false),
    once: booleanish.default(false),
    sinceId: z.string().min(1).optional(),
    batchSize: z.coerce.number().int().min(1).max(40).default(20), // Mastodon caps tag timelines at 40
    pollIntervalSeconds: z.coerce.number().int().min(1).max(86400).default(5),
    localOnly: booleanish.default(true),
    introductionsOnly: booleanish.default(true),
    replyVisibility: VisibilitySchema.default('unlisted'),
    welcomeTemplate: z.string()
      .min(1)
      .refine((template) => template.includes('{handle}'), {
        message: 'Welcome template must contain {handle}'
      })
      .default(DEFAULT_WELCOME_TEMPLATE)
  })
});

export type Config = z.infer<typeof ConfigSchema>;
export type MastodonConfig = Config['mastodon'];
export type BotConfig = Config['bot'];
