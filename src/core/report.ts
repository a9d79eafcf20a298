import { ValidationReport } from './types';

export interface JsonReport {
    ok: boolean;
    status: ValidationReport['status'];
    filesChecked: number;
    violations: ValidationReport['violations'];
}

export function toJsonReport(report: ValidationReport): JsonReport {
    return {
        ok: report.violations.length === 0,
        status: report.status,
        filesChecked: report.filesChecked,
        violations: report.violations.map(v => ({ file: v.file, kind: v.kind, message: v.message }))
    };
}

export function formatJsonReport(report: ValidationReport): string {
    return JSON.stringify(toJsonReport(report), null, 2);
}

export function formatSummary(report: ValidationReport): string {
    return `Checked ${report.filesChecked} rule file(s): ${report.violations.length} violation(s)`;
}
