/**
 * Validator walks the rules directory and checks each rule file
 * for length and for an activation marker.
 *
 * One linear pass: files are read and checked one at a time, and each
 * violation is logged as soon as it is found, in traversal order.
 */

import { parseOptions, resolveConfig, LintOptions } from './config';
import { discoverRuleFiles } from './discovery';
import { ReadAbortError } from './errors';
import { readRuleFile } from './io';
import { ConsoleLogger, LintLogger } from './logger';
import { buildMarkerPattern, checkRuleFile, unreadableMessage } from './rules';
import { ExitStatus, LintConfig, ValidationReport, Violation } from './types';

export class Validator {
    private markerPattern: RegExp;

    constructor(private config: LintConfig, private logger: LintLogger = new ConsoleLogger()) {
        this.markerPattern = buildMarkerPattern(config.markers);
    }

    /**
     * Runs the full pass and resolves with the report.
     * Rejects with ReadAbortError on the first unreadable file or
     * directory when onReadError is 'abort'.
     */
    async run(): Promise<ValidationReport> {
        const entries = await discoverRuleFiles(this.config.rulesDir, this.config.extension);
        const violations: Violation[] = [];
        let filesChecked = 0;

        for (const entry of entries) {
            let found: Violation[];
            if (entry.type === 'unreadable-dir') {
                found = [this.readFailure(entry.path, entry.reason)];
            } else {
                filesChecked++;
                found = await this.checkFile(entry.path);
            }

            for (const violation of found) {
                this.logger.error(violation.message);
                violations.push(violation);
            }
        }

        return {
            status: violations.length > 0 ? ExitStatus.VIOLATIONS : ExitStatus.OK,
            filesChecked,
            violations
        };
    }

    async checkFile(filePath: string): Promise<Violation[]> {
        const result = await readRuleFile(filePath);

        if (!result.ok) {
            return [this.readFailure(result.path, result.reason)];
        }

        return checkRuleFile(result.file, this.config, this.markerPattern);
    }

    /** Throws under 'abort', otherwise returns the violation to record */
    private readFailure(filePath: string, reason: string): Violation {
        if (this.config.onReadError === 'abort') {
            throw new ReadAbortError(filePath, reason);
        }
        return {
            file: filePath,
            kind: 'unreadable',
            message: unreadableMessage(filePath, reason)
        };
    }
}

/**
 * Validate the rule files of a workspace.
 * Options default to <root>/.windsurf/rules, *.md, 6000 chars and the
 * standard activation markers.
 */
export async function validate(
    rootDirectory: string,
    options: LintOptions = {},
    logger: LintLogger = new ConsoleLogger()
): Promise<ValidationReport> {
    const config = resolveConfig(rootDirectory, {}, parseOptions(options));
    return new Validator(config, logger).run();
}
