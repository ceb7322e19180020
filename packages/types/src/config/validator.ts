import { z } from 'zod';

const positiveInteger = z.number().int().positive();

/** 1文字（サロゲートペアも1文字として数える） */
const character = z
  .string()
  .refine((value) => [...value].length === 1, { message: 'must be a single character' });

export const contextSchema = z.object({
  name: z.string(),
  version: z.string(),
  url: z.string(),
});

/**
 * 設定ファイル中の各オプション（すべて省略可能）
 */
export const optionsSchema = z.object({
  paths: z
    .object({
      directory: z.string().optional(),
      output: z.string().optional(),
    })
    .optional(),
  start: z.string().optional(),
  levels: z
    .object({
      entry: positiveInteger.optional(),
      section: positiveInteger.optional(),
    })
    .optional(),
  indents: z
    .object({
      heading: character.optional(),
      bullet: character.optional(),
    })
    .optional(),
  formats: z
    .object({
      title: z.string().optional(),
      fragment: z.string().optional(),
    })
    .optional(),
  wrap: positiveInteger.optional(),
  order: z.array(z.string()).optional(),
  types: z.record(z.string()).optional(),
});

export const workspaceSchema = optionsSchema.extend({
  context: contextSchema,
});

export type ConfigOptions = z.infer<typeof optionsSchema>;
export type WorkspaceOptions = z.infer<typeof workspaceSchema>;

/**
 * 設定オブジェクトをバリデーション
 * @throws 不正なフィールドをすべて列挙したError
 */
export function validateWorkspace(value: unknown): WorkspaceOptions {
  const result = workspaceSchema.safeParse(value);

  if (!result.success) {
    const messages = result.error.issues.map((issue) => {
      const field = ['config', ...issue.path].join('.');
      return `${field}: ${issue.message}`;
    });
    throw new Error(messages.join('\n'));
  }

  return result.data;
}
