/**
 * CORE: Rule file checks
 * Pure functions. No I/O.
 */

import { LintConfig, RuleFile, Violation } from './types';

export const DEFAULT_MAX_LENGTH = 6000;

export const DEFAULT_MARKERS: readonly string[] = ['<glob', 'Always On', 'Manual', 'Model Decision'];

/** Counts code points, so a surrogate pair is one character. */
export function countCharacters(content: string): number {
    let count = 0;
    for (const _ of content) {
        count++;
    }
    return count;
}

export function exceedsMaxLength(length: number, maxLength: number): boolean {
    return length > maxLength;
}

function escapeRegExp(text: string): string {
    return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Case-insensitive alternation of literal markers.
 */
export function buildMarkerPattern(markers: readonly string[]): RegExp {
    if (markers.length === 0) {
        throw new Error('At least one activation marker is required');
    }
    return new RegExp(markers.map(escapeRegExp).join('|'), 'i');
}

export function hasActivationMarker(content: string, pattern: RegExp): boolean {
    return pattern.test(content);
}

export function lengthMessage(filePath: string, maxLength: number): string {
    return `${filePath} exceeds ${maxLength} chars`;
}

export function missingMarkerMessage(filePath: string): string {
    return `${filePath} missing activation marker`;
}

export function unreadableMessage(filePath: string, reason: string): string {
    return `${filePath} could not be read: ${reason}`;
}

/**
 * Length is checked before the marker, so output order is stable per file.
 */
export function checkRuleFile(
    file: RuleFile,
    config: Pick<LintConfig, 'maxLength'>,
    markerPattern: RegExp
): Violation[] {
    const violations: Violation[] = [];

    if (exceedsMaxLength(file.length, config.maxLength)) {
        violations.push({
            file: file.path,
            kind: 'length-exceeded',
            message: lengthMessage(file.path, config.maxLength)
        });
    }

    if (!hasActivationMarker(file.content, markerPattern)) {
        violations.push({
            file: file.path,
            kind: 'missing-activation-marker',
            message: missingMarkerMessage(file.path)
        });
    }

    return violations;
}
