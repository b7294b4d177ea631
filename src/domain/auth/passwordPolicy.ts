export const PASSWORD_MIN_LENGTH = 6;
export const PASSWORD_MAX_LENGTH = 128;

export type PasswordRule = 'minLength' | 'maxLength' | 'uppercase' | 'lowercase' | 'digit';

export interface PasswordPolicyResult {
  valid: boolean;
  violations: PasswordRule[];
}

interface RuleDefinition {
  rule: PasswordRule;
  message: string;
  test: (candidate: string) => boolean;
}

const RULES: readonly RuleDefinition[] = [
  {
    rule: 'minLength',
    message: `Password must be at least ${PASSWORD_MIN_LENGTH} characters long`,
    test: (candidate) => candidate.length >= PASSWORD_MIN_LENGTH,
  },
  {
    rule: 'maxLength',
    message: `Password must be at most ${PASSWORD_MAX_LENGTH} characters long`,
    test: (candidate) => candidate.length <= PASSWORD_MAX_LENGTH,
  },
  {
    rule: 'uppercase',
    message: 'Password must contain at least one uppercase letter',
    test: (candidate) => /[A-Z]/.test(candidate),
  },
  {
    rule: 'lowercase',
    message: 'Password must contain at least one lowercase letter',
    test: (candidate) => /[a-z]/.test(candidate),
  },
  {
    rule: 'digit',
    message: 'Password must contain at least one digit',
    test: (candidate) => /[0-9]/.test(candidate),
  },
];

/**
 * Check a plaintext candidate against every password rule.
 * Violations are reported in rule order.
 */
export function checkPasswordPolicy(candidate: string): PasswordPolicyResult {
  const violations = RULES.filter((r) => !r.test(candidate)).map((r) => r.rule);
  return { valid: violations.length === 0, violations };
}

export function passwordRuleMessage(rule: PasswordRule): string {
  const definition = RULES.find((r) => r.rule === rule);
  return definition ? definition.message : 'Password does not meet the password policy';
}
