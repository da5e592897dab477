import type { DetectorDescriptor, MatchContext, ScanCategory } from "../pattern_scanner.types";
import { isPlaceholderValue, isTestPath } from "./suppression";

/**
 * Catalog control each category feeds.
 */
export const CATEGORY_CONTROLS: Readonly<Record<ScanCategory, string>> = {
  "hardcoded-secret": "CR-02",
  "weak-cryptography": "CR-04",
  "insecure-transport": "DM-10",
  "injection-risk": "DM-11",
  "missing-auth-logging": "SM-01",
};

/**
 * One-line gap text per category, used when matches become assessment gaps.
 */
export const CATEGORY_GAPS: Readonly<Record<ScanCategory, string>> = {
  "hardcoded-secret": "Hardcoded secret or credential in source code",
  "weak-cryptography": "Deprecated or weak cryptographic primitive in use",
  "insecure-transport": "Transport encryption missing or disabled",
  "injection-risk": "Query built by string concatenation or interpolation",
  "missing-auth-logging": "Authentication code path without security event logging",
};

export const SOURCE_EXTENSIONS: readonly string[] = [
  ".py", ".js", ".mjs", ".cjs", ".ts", ".jsx", ".tsx",
  ".java", ".kt", ".go", ".rb", ".php", ".cs", ".scala", ".rs",
];

const CONFIG_EXTENSIONS: readonly string[] = [
  ".json", ".yaml", ".yml", ".toml", ".ini", ".conf", ".properties", ".xml", ".env",
];

/** Longest run of string characters examined on either side of a SQL keyword */
const SPAN = "{0,200}";

const SQL_VERB = String.raw`(?:SELECT\b[^"'\x60]${SPAN}\bFROM|INSERT\s+INTO|UPDATE\s+\w+\s+SET|DELETE\s+FROM)\b`;

/** Query call whose first argument is built from a SQL string plus a variable */
export const QUERY_CALL_WITH_DYNAMIC_SQL = new RegExp(
  String.raw`\b(?:query|execute|executemany|exec|raw|prepare)\s*\(\s*` +
    String.raw`(?:f?["'][^"']${SPAN}${SQL_VERB}[^"']${SPAN}["']\s*(?:\+|%|\.format\()|` +
    String.raw`\x60[^\x60]${SPAN}${SQL_VERB}[^\x60]${SPAN}\$\{|` +
    String.raw`f["'][^"']${SPAN}${SQL_VERB}[^"']${SPAN}\{)`,
  "i"
);

const SQL_CONCATENATION = new RegExp(
  String.raw`["'][^"']${SPAN}${SQL_VERB}[^"']${SPAN}["']\s*\+|\x60[^\x60]${SPAN}${SQL_VERB}[^\x60]${SPAN}\$\{`,
  "i"
);

const AUTH_NAME = String.raw`(?:login|log_in|signIn|sign_in|authenticate|verifyPassword|verify_password|checkPassword|check_password)`;

const AUTH_FUNCTION_DEFINITION = new RegExp(
  String.raw`(?:\bfunction\s*\*?\s+|\bdef\s+|\bfunc\s+)${AUTH_NAME}\s*\(|` +
    String.raw`\b${AUTH_NAME}\s*[:=]\s*(?:async\s*)?(?:function\b|\([^)]*\)\s*=>|\w+\s*=>)|` +
    String.raw`^\s*(?:(?:public|private|protected|static|async)\s+)*${AUTH_NAME}\s*\([^)]*\)\s*(?::\s*[^={]+)?\{`,
  "i"
);

const LOCAL_OR_EXAMPLE_HOST =
  /^(?:localhost|127(?:\.\d{1,3}){3}|0\.0\.0\.0|\[::1\]|(?:[\w-]+\.)*example(?:\.com|\.org|\.net)?|[\w.-]+\.(?:local|localhost|test|example|invalid)|(?:www\.)?w3\.org|schemas\.(?:xmlsoap\.org|microsoft\.com|android\.com)|json-schema\.org|xml\.apache\.org)$/i;

function hostOf(url: string): string {
  const match = /^http:\/\/([^/:?#"'\s]+)/i.exec(url);
  return match?.[1] ?? "";
}

const URL_VALUE = /^https?:\/\//i;

function suppressSecret({ file, value }: MatchContext): boolean {
  if (isTestPath(file)) return true;
  return value !== undefined && (isPlaceholderValue(value) || URL_VALUE.test(value));
}

/**
 * Built-in detector table, in evaluation order.
 */
export const DETECTORS: readonly DetectorDescriptor[] = [
  // === SECRETS ===
  {
    kind: "pattern",
    id: "SEC-001",
    pattern:
      /(?<![\w-])[\w-]{0,64}?(?:password|passwd|pwd|secret|token|api[_-]?key|apikey|access[_-]?key|private[_-]?key|client[_-]?secret)\b["']?\s*[:=]\s*["']([^"'\s]{8,})["']/i,
    category: "hardcoded-secret",
    severity: "critical",
    controlId: CATEGORY_CONTROLS["hardcoded-secret"],
    confidence: "definite",
    message: "Credential assigned a string literal",
    suppress: suppressSecret,
  },
  {
    kind: "pattern",
    id: "SEC-002",
    pattern: /\b(AKIA[0-9A-Z]{16})\b/,
    category: "hardcoded-secret",
    severity: "critical",
    controlId: CATEGORY_CONTROLS["hardcoded-secret"],
    confidence: "definite",
    message: "AWS access key id",
    suppress: suppressSecret,
  },
  {
    kind: "pattern",
    id: "SEC-003",
    pattern: /-----BEGIN (?:RSA |DSA |EC |OPENSSH |ENCRYPTED )?PRIVATE KEY-----/,
    category: "hardcoded-secret",
    severity: "critical",
    controlId: CATEGORY_CONTROLS["hardcoded-secret"],
    confidence: "definite",
    message: "Private key block",
    suppress: ({ file }) => isTestPath(file),
  },
  {
    kind: "pattern",
    id: "SEC-004",
    pattern: /\bBasic\s+([A-Za-z0-9+/]{16,}={0,2})(?![A-Za-z0-9+/=])/,
    category: "hardcoded-secret",
    severity: "high",
    controlId: CATEGORY_CONTROLS["hardcoded-secret"],
    confidence: "heuristic",
    message: "Embedded HTTP Basic credentials",
    suppress: suppressSecret,
  },

  // === CRYPTOGRAPHY ===
  {
    kind: "pattern",
    id: "CRY-001",
    pattern:
      /createHash\(\s*["'](?:md4|md5|sha1)["']|createCipheriv?\(\s*["'](?:des|rc4|rc2|bf)[\w-]*["']|hashlib\.(?:md5|sha1)\s*\(|MessageDigest\.getInstance\(\s*"(?:MD5|SHA-?1)"|Cipher\.getInstance\(\s*"(?:DES|DESede|RC4|RC2)\b[^"]*"/i,
    category: "weak-cryptography",
    severity: "high",
    controlId: CATEGORY_CONTROLS["weak-cryptography"],
    confidence: "definite",
    message: "Deprecated hash or cipher selected",
    appliesTo: SOURCE_EXTENSIONS,
  },
  {
    kind: "pattern",
    id: "CRY-002",
    pattern: /(?<![\w.])(?:md5|sha1|rc4)\s*\(/i,
    category: "weak-cryptography",
    severity: "medium",
    controlId: CATEGORY_CONTROLS["weak-cryptography"],
    confidence: "heuristic",
    message: "Call to a weak primitive by name",
    appliesTo: SOURCE_EXTENSIONS,
  },

  // === TRANSPORT ===
  {
    kind: "pattern",
    id: "TLS-001",
    pattern:
      /rejectUnauthorized\s*:\s*false|\bverify\s*=\s*False\b|InsecureSkipVerify\s*:\s*true|NODE_TLS_REJECT_UNAUTHORIZED\s*=\s*["']?0|CURLOPT_SSL_VERIFYPEER\s*,\s*(?:0|false)/,
    category: "insecure-transport",
    severity: "high",
    controlId: CATEGORY_CONTROLS["insecure-transport"],
    confidence: "definite",
    message: "Certificate verification disabled",
  },
  {
    kind: "pattern",
    id: "TLS-002",
    pattern: /["'\x60](http:\/\/[^"'\x60\s]+)["'\x60]/i,
    category: "insecure-transport",
    severity: "medium",
    controlId: CATEGORY_CONTROLS["insecure-transport"],
    confidence: "heuristic",
    message: "Plaintext HTTP endpoint",
    appliesTo: [...SOURCE_EXTENSIONS, ...CONFIG_EXTENSIONS],
    suppress: ({ file, value }) =>
      isTestPath(file) ||
      value === undefined ||
      LOCAL_OR_EXAMPLE_HOST.test(hostOf(value)) ||
      isPlaceholderValue(hostOf(value)),
  },
  {
    kind: "absence",
    id: "TLS-003",
    trigger: /\b(?:https?\.)?createServer\s*\(|\bapp\.listen\s*\(|\bserver\.listen\s*\(|\bapp\.run\s*\(|\bhttp\.ListenAndServe\s*\(/,
    indicators: [/\bhttps\b|\btls\b|\bssl\b|Strict-Transport-Security|\bhsts\b|\bhelmet\b|ListenAndServeTLS/i],
    category: "insecure-transport",
    severity: "medium",
    controlId: CATEGORY_CONTROLS["insecure-transport"],
    confidence: "heuristic",
    message: "Server started without any TLS or HSTS configuration in the file",
    appliesTo: SOURCE_EXTENSIONS,
    suppress: ({ file }) => isTestPath(file),
  },

  // === INJECTION ===
  {
    kind: "pattern",
    id: "INJ-001",
    pattern: QUERY_CALL_WITH_DYNAMIC_SQL,
    category: "injection-risk",
    severity: "critical",
    controlId: CATEGORY_CONTROLS["injection-risk"],
    confidence: "definite",
    message: "Query executed with SQL built from string concatenation or interpolation",
    appliesTo: SOURCE_EXTENSIONS,
  },
  {
    kind: "pattern",
    id: "INJ-002",
    pattern: SQL_CONCATENATION,
    category: "injection-risk",
    severity: "high",
    controlId: CATEGORY_CONTROLS["injection-risk"],
    confidence: "heuristic",
    message: "SQL statement assembled by string concatenation",
    appliesTo: SOURCE_EXTENSIONS,
    // Already reported as INJ-001 on the same line
    suppress: ({ line }) => QUERY_CALL_WITH_DYNAMIC_SQL.test(line),
  },

  // === LOGGING ===
  {
    kind: "absence",
    id: "LOG-001",
    trigger: AUTH_FUNCTION_DEFINITION,
    indicators: [
      /\blogger\b|\blogging\.|\blog\.(?:info|warn|warning|error|debug)\b|console\.(?:log|info|warn|error)\b|\baudit/i,
    ],
    category: "missing-auth-logging",
    severity: "medium",
    controlId: CATEGORY_CONTROLS["missing-auth-logging"],
    confidence: "heuristic",
    message: "Authentication function in a file with no logging calls",
    appliesTo: SOURCE_EXTENSIONS,
    suppress: ({ file }) => isTestPath(file),
  },
];
