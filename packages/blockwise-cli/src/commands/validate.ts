import { Command } from 'commander';
import type { ValidationResult } from 'blockwise-core';
import { closeDb, initializeDbFromOptions, type Services } from '../db.js';
import { ExitCode, handleError } from '../errors.js';
import { GlobalOptionsSchema } from '../types.js';

export function runValidate(options: { services: Services; json: boolean }): ValidationResult {
  const { services, json } = options;

  const result = services.validationService.validate();

  if (json) {
    console.log(JSON.stringify(result));
  } else if (result.issues.length === 0) {
    console.log('✓ Blocker graph is consistent, no issues found');
  } else {
    const verdict = result.isValid ? '⚠' : '✗';
    console.log(`${verdict} Found ${result.issues.length} issue(s):`);
    for (const issue of result.issues) {
      const icon = issue.severity === 'error' ? '✗' : '⚠';
      console.log(`  ${icon} [${issue.type}] ${issue.message}`);
    }
  }

  return result;
}

export function createValidateCommand(): Command {
  return new Command('validate')
    .description('Check the blocker graph for cycles, stale blockers and status drift')
    .action(function (this: Command) {
      const globalOpts = GlobalOptionsSchema.parse(this.optsWithGlobals());
      const services = initializeDbFromOptions(globalOpts);
      try {
        const result = runValidate({ services, json: globalOpts.json });
        if (!result.isValid) {
          process.exitCode = ExitCode.ValidationError;
        }
      } catch (e) {
        handleError(e, globalOpts.json);
      } finally {
        closeDb(services);
      }
    });
}
