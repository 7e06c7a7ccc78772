import chalk from "chalk";
import cliProgress from "cli-progress";

export interface ConnectionProgress {
	succeeded: number;
	failed: number;
}

/**
 * Create a progress bar counting settled connections.
 */
export function createConnectionProgressBar(label: string): cliProgress.SingleBar {
	return new cliProgress.SingleBar(
		{
			format: `${chalk.cyan(label)} ${chalk.gray("|")} {bar} ${chalk.gray("|")} {value}/{total} (${chalk.green("✓")} {succeeded} ${chalk.red("✗")} {failed})`,
			barCompleteChar: "█",
			barIncompleteChar: "░",
			hideCursor: true,
			clearOnComplete: false,
			stopOnComplete: true,
		},
		cliProgress.Presets.shades_classic,
	);
}

export function startProgressBar(bar: cliProgress.SingleBar, total: number): void {
	bar.start(total, 0, { succeeded: 0, failed: 0 });
}

export function updateProgressBar(bar: cliProgress.SingleBar, progress: ConnectionProgress): void {
	bar.update(progress.succeeded + progress.failed, { ...progress });
}

export function stopProgressBar(bar: cliProgress.SingleBar): void {
	bar.stop();
}
