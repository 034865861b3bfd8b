#!/usr/bin/env node
import chalk from 'chalk';
import meow from 'meow';
import {loadConfig} from '../lib/config.js';
import {ValidationError, errorMessage} from '../lib/errors.js';
import {createSearchEngine} from '../engine.js';
import {formatReport} from '../eval/report.js';

const cli = meow(
	`
	Usage
	  $ find-evaluate <dataset>

	Options
	  --min-score      Ignore hits scoring below this value (default 0)
	  --force-reindex  Rebuild the evaluation index even if it exists
	  --keep-index     Leave the evaluation index in place afterwards
	  --details        Print the evaluation of every query
	  --config         JSON configuration file (else FIND_CONFIG_FILE)

	Examples
	  $ find-evaluate sample --details
	  $ FIND_HYBRID_ENABLED=true find-evaluate sample --force-reindex
`,
	{
		importMeta: import.meta,
		flags: {
			minScore: {type: 'number', default: 0},
			forceReindex: {type: 'boolean', default: false},
			keepIndex: {type: 'boolean', default: false},
			details: {type: 'boolean', default: false},
			config: {type: 'string'},
		},
	},
);

async function main(): Promise<number> {
	const [dataset] = cli.input;
	if (!dataset) {
		cli.showHelp(0);
		return 2;
	}

	const config = await loadConfig({file: cli.flags.config});
	const engine = createSearchEngine({config});

	try {
		process.stdout.write(chalk.dim(`Evaluating dataset "${dataset}"…\n`));
		const report = await engine.harness.evaluate({
			dataset,
			minScore: cli.flags.minScore,
			forceReindex: cli.flags.forceReindex,
			keepIndex: cli.flags.keepIndex,
		});
		process.stdout.write(
			formatReport(report, {details: cli.flags.details}) + '\n',
		);
		process.stdout.write(chalk.green('Evaluation completed\n'));
		return 0;
	} finally {
		await engine.close();
	}
}

try {
	process.exitCode = await main();
} catch (error) {
	process.stderr.write(chalk.red(`Error: ${errorMessage(error)}\n`));
	if (error instanceof ValidationError) {
		for (const issue of error.issues) {
			process.stderr.write(chalk.red(`  - ${issue}\n`));
		}
	}
	process.exitCode = 1;
}
