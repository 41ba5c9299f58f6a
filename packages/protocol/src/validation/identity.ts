// Identity leak detection
//
// Scans JSON payloads headed for the processing store for anything that
// looks like raw identity. Findings carry the path and rule only, never
// the offending value, so they are safe to log. Object keys are matched
// against the value patterns too; a key that matches one is replaced in
// the path by its position, e.g. "$.scores.<key:0>".

/**
 * A single finding from an identity scan.
 */
export type IdentityLeak = {
  /** JSONPath-like location, e.g. "$.patient.full_name" */
  path: string;
  code: IdentityLeakCode;
  /** Name of the key or pattern that matched */
  rule: string;
};

export type IdentityLeakCode = 'IDENTITY_KEY' | 'IDENTITY_PATTERN';

/**
 * Object keys that name identity attributes. Compared after lowercasing
 * and stripping everything but letters and digits, so "full_name",
 * "fullName" and "Full-Name" all match "fullname".
 */
export const DISALLOWED_IDENTITY_KEYS: ReadonlySet<string> = new Set([
  'fullname',
  'firstname',
  'lastname',
  'surname',
  'patientname',
  'dateofbirth',
  'birthdate',
  'dob',
  'mrn',
  'hospitalmrn',
  'medicalrecordnumber',
  'ssn',
  'socialsecuritynumber',
  'nationalid',
  'phone',
  'phonenumber',
  'email',
  'emailaddress',
  'address',
  'streetaddress',
  'homeaddress',
  'identityblob',
  'patientkeyhash',
  'senderref',
]);

/**
 * String patterns that indicate raw identity inside free text.
 */
export const IDENTITY_PATTERNS: ReadonlyArray<{ name: string; pattern: RegExp }> = [
  { name: 'email', pattern: /[A-Z0-9._%+-]+@[A-Z0-9.-]+\.[A-Z]{2,}/i },
  { name: 'ssn', pattern: /\b\d{3}-\d{2}-\d{4}\b/ },
  { name: 'phone', pattern: /\+\d{1,3}[\s-]?\(?\d{2,4}\)?[\s-]?\d{3}[\s-]?\d{3,4}\b/ },
  { name: 'mrn', pattern: /\bMRN[\s:_-]*[A-Z0-9][A-Z0-9-]{3,}\b/i },
  { name: 'identity_blob', pattern: /^v1:[A-Za-z0-9+/=]+:[A-Za-z0-9+/=]+:[A-Za-z0-9+/=]+$/ },
];

function matchPatterns(text: string): string[] {
  return IDENTITY_PATTERNS.filter(({ pattern }) => pattern.test(text)).map(({ name }) => name);
}

function normalizeKey(key: string): string {
  return key.toLowerCase().replace(/[^a-z0-9]/g, '');
}

/**
 * Whether an object key names an identity attribute.
 */
export function isIdentityKey(key: string): boolean {
  return DISALLOWED_IDENTITY_KEYS.has(normalizeKey(key));
}

/**
 * Walk a value and collect identity leaks.
 *
 * @example
 * ```typescript
 * findIdentityLeaks({ grade: 2, full_name: 'x' });
 * // [{ path: '$.full_name', code: 'IDENTITY_KEY', rule: 'fullname' }]
 * ```
 */
export function findIdentityLeaks(value: unknown, path = '$'): IdentityLeak[] {
  if (typeof value === 'string') {
    return matchPatterns(value).map((rule): IdentityLeak => ({ path, code: 'IDENTITY_PATTERN', rule }));
  }

  if (Array.isArray(value)) {
    return value.flatMap((item, index) => findIdentityLeaks(item, `${path}[${index}]`));
  }

  if (value !== null && typeof value === 'object') {
    const leaks: IdentityLeak[] = [];
    for (const [index, [key, child]] of Object.entries(value).entries()) {
      const keyRules = matchPatterns(key);
      const childPath = keyRules.length > 0 ? `${path}.<key:${index}>` : `${path}.${key}`;
      for (const rule of keyRules) {
        leaks.push({ path: childPath, code: 'IDENTITY_PATTERN', rule });
      }
      if (isIdentityKey(key)) {
        leaks.push({ path: childPath, code: 'IDENTITY_KEY', rule: normalizeKey(key) });
      }
      leaks.push(...findIdentityLeaks(child, childPath));
    }
    return leaks;
  }

  return [];
}
