/**
 * CORE: Shared types for the rule file linter.
 */

export type ViolationKind = 'length-exceeded' | 'missing-activation-marker' | 'unreadable';

export interface RuleFile {
    path: string;
    content: string;
    /** Length in characters (code points), not UTF-16 units */
    length: number;
}

export interface Violation {
    file: string;
    kind: ViolationKind;
    message: string;
}

export const ExitStatus = {
    OK: 0,
    VIOLATIONS: 1,
    ERROR: 2
} as const;

export type ExitStatus = typeof ExitStatus[keyof typeof ExitStatus];

export interface ValidationReport {
    status: typeof ExitStatus.OK | typeof ExitStatus.VIOLATIONS;
    filesChecked: number;
    violations: Violation[];
}

export type ReadErrorPolicy = 'report' | 'abort';

export interface LintConfig {
    /** Absolute path of the directory scanned for rule files */
    rulesDir: string;
    extension: string;
    maxLength: number;
    markers: string[];
    onReadError: ReadErrorPolicy;
}
