import { z } from 'zod';
import { branchNameProblem } from '../naming/branch-name.js';
import { protectedPatternProblem } from '../protection/matcher.js';

export const PR_NUMBER_PLACEHOLDER = '{number}';
export const DEFAULT_PR_FORMAT = `pr-${PR_NUMBER_PLACEHOLDER}`;
export const DEFAULT_HOOK_TIMEOUT_SECONDS = 300;

const TRUE_VALUES = new Set(['true', 'yes', 'on', '1']);
const FALSE_VALUES = new Set(['false', 'no', 'off', '0']);

export type ConfigKeyName =
  | 'workon.defaultBranch'
  | 'workon.postCreateHook'
  | 'workon.copyPattern'
  | 'workon.copyExclude'
  | 'workon.autoCopyUntracked'
  | 'workon.pruneProtectedBranches'
  | 'workon.prFormat'
  | 'workon.hookTimeout';

export interface SingleKeyDefinition<S extends z.ZodTypeAny = z.ZodTypeAny, D = z.output<S>> {
  readonly kind: 'single';
  readonly key: ConfigKeyName;
  readonly schema: S;
  readonly defaultValue: D;
}

export interface MultiKeyDefinition {
  readonly kind: 'multi';
  readonly key: ConfigKeyName;
  readonly itemSchema: z.ZodType<string>;
}

const ruleFrom = (problem: (value: string) => string | undefined) =>
  z.string().superRefine((value, ctx) => {
    const message = problem(value);
    if (message) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message });
    }
  });

const nonEmpty = z.string().refine((value) => value.trim().length > 0, 'value must not be empty');

const branchName = ruleFrom(branchNameProblem);

const gitBoolean = z
  .string()
  .trim()
  .toLowerCase()
  .refine((value) => TRUE_VALUES.has(value) || FALSE_VALUES.has(value), 'expected one of true/yes/on/1 or false/no/off/0')
  .transform((value) => TRUE_VALUES.has(value));

const nonNegativeInteger = z
  .string()
  .trim()
  .regex(/^\d+$/, 'expected a non-negative integer')
  .transform((value) => Number.parseInt(value, 10));

export function prFormatProblem(template: string): string | undefined {
  if (!template.includes(PR_NUMBER_PLACEHOLDER)) {
    return `template must contain ${PR_NUMBER_PLACEHOLDER}`;
  }

  const unknownPlaceholder = template.replaceAll(PR_NUMBER_PLACEHOLDER, '').match(/\{[^}]*\}/);
  if (unknownPlaceholder) {
    return `unknown placeholder ${unknownPlaceholder[0]}, only ${PR_NUMBER_PLACEHOLDER} is supported`;
  }

  const problem = branchNameProblem(template.replaceAll(PR_NUMBER_PLACEHOLDER, '1'));
  return problem ? `template does not yield a valid branch name (${problem})` : undefined;
}

const prFormat = ruleFrom(prFormatProblem);

export const CONFIG_KEYS = {
  defaultBranch: {
    kind: 'single',
    key: 'workon.defaultBranch',
    schema: branchName,
    defaultValue: null,
  } satisfies SingleKeyDefinition<typeof branchName, null>,
  postCreateHooks: { kind: 'multi', key: 'workon.postCreateHook', itemSchema: nonEmpty } satisfies MultiKeyDefinition,
  copyPatterns: { kind: 'multi', key: 'workon.copyPattern', itemSchema: nonEmpty } satisfies MultiKeyDefinition,
  copyExcludes: { kind: 'multi', key: 'workon.copyExclude', itemSchema: nonEmpty } satisfies MultiKeyDefinition,
  autoCopyUntracked: {
    kind: 'single',
    key: 'workon.autoCopyUntracked',
    schema: gitBoolean,
    defaultValue: false,
  } satisfies SingleKeyDefinition<typeof gitBoolean>,
  protectedPatterns: {
    kind: 'multi',
    key: 'workon.pruneProtectedBranches',
    itemSchema: ruleFrom(protectedPatternProblem),
  } satisfies MultiKeyDefinition,
  prFormat: {
    kind: 'single',
    key: 'workon.prFormat',
    schema: prFormat,
    defaultValue: DEFAULT_PR_FORMAT,
  } satisfies SingleKeyDefinition<typeof prFormat>,
  hookTimeoutSeconds: {
    kind: 'single',
    key: 'workon.hookTimeout',
    schema: nonNegativeInteger,
    defaultValue: DEFAULT_HOOK_TIMEOUT_SECONDS,
  } satisfies SingleKeyDefinition<typeof nonNegativeInteger>,
} as const;

export interface WorkonSettings {
  defaultBranch: string | null;
  postCreateHooks: string[];
  copyPatterns: string[];
  copyExcludes: string[];
  autoCopyUntracked: boolean;
  protectedPatterns: string[];
  prFormat: string;
  hookTimeoutSeconds: number;
}
