import { z } from 'zod';

const blankToUndefined = (v: unknown) => (typeof v === 'string' && v.trim() === '' ? undefined : v);

const envSchema = z.object({
  CHEATSHEET_DATA: z.preprocess(blankToUndefined, z.string().trim().optional()),
  CHEATSHEET_STRICT: z.preprocess(
    blankToUndefined,
    z
      .enum(['1', '0', 'true', 'false'], {
        errorMap: () => ({ message: 'CHEATSHEET_STRICT must be 1, 0, true or false' }),
      })
      .optional(),
  ),
});

export type Config = {
  dataPath?: string; // content file to use instead of the bundled one
  strict: boolean; // treat warnings as failures in `check`
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const res = envSchema.safeParse(env);
  if (!res.success) {
    throw new Error(res.error.issues.map((i) => i.message).join('; '));
  }
  const { CHEATSHEET_DATA, CHEATSHEET_STRICT } = res.data;
  return {
    dataPath: CHEATSHEET_DATA,
    strict: CHEATSHEET_STRICT === '1' || CHEATSHEET_STRICT === 'true',
  };
}
