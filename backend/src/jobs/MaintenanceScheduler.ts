import type { OnboardingOrchestrator } from "../onboarding/OnboardingOrchestrator";
import type { TokenHealthService } from "../onboarding/TokenHealthService";
import { getLog } from "../util/Logger";
import PgBoss from "pg-boss";

const log = getLog(import.meta);

export interface MaintenanceJob {
	name: string;
	cron: string;
	run(): Promise<unknown>;
}

export interface MaintenanceScheduler {
	/** Starts pg-boss, creates one queue per job, schedules it and registers its worker. */
	start(): Promise<void>;

	stop(): Promise<void>;

	/**
	 * Runs a job in this process, outside the schedule.
	 * @throws Error for an unknown job name
	 */
	runNow(name: string): Promise<unknown>;
}

export interface MaintenanceSchedulerOptions {
	connectionString: string;
	ssl: boolean;
	/** Postgres schema pg-boss keeps its tables in. */
	schema: string;
	jobs: Array<MaintenanceJob>;
}

export interface MaintenanceCrons {
	resetStuck: string;
	retryFailed: string;
	tokenHealth: string;
}

export function getMaintenanceJobs(
	orchestrator: Pick<OnboardingOrchestrator, "resetStuckTasks" | "retryFailedTasks">,
	tokenHealth: Pick<TokenHealthService, "checkAll">,
	crons: MaintenanceCrons,
): Array<MaintenanceJob> {
	return [
		{ name: "onboarding-reset-stuck", cron: crons.resetStuck, run: () => orchestrator.resetStuckTasks() },
		{ name: "onboarding-retry-failed", cron: crons.retryFailed, run: () => orchestrator.retryFailedTasks() },
		{ name: "token-health-check", cron: crons.tokenHealth, run: () => tokenHealth.checkAll() },
	];
}

/**
 * Periodic maintenance on pg-boss cron schedules. pg-boss makes sure a schedule fires
 * once across every instance sharing the database.
 */
export function createMaintenanceScheduler(options: MaintenanceSchedulerOptions): MaintenanceScheduler {
	const jobs = new Map(options.jobs.map(job => [job.name, job]));
	let boss: PgBoss | undefined;

	return { start, stop, runNow };

	async function runNow(name: string): Promise<unknown> {
		const job = jobs.get(name);
		if (!job) {
			throw new Error(`Unknown maintenance job: ${name}`);
		}
		const start = Date.now();
		const result = await job.run();
		log.info({ job: name, result, durationMs: Date.now() - start }, "Maintenance job %s finished", name);
		return result;
	}

	function createHandler(name: string): PgBoss.WorkHandler<object> {
		return async () => {
			try {
				await runNow(name);
			} catch (error) {
				log.error(error, "Maintenance job %s failed", name);
				// pg-boss records the failure
				throw error;
			}
		};
	}

	async function start(): Promise<void> {
		if (boss) {
			return;
		}
		const instance = new PgBoss({
			connectionString: options.connectionString,
			schema: options.schema,
			ssl: options.ssl && { rejectUnauthorized: false },
		});
		instance.on("error", error => log.error(error, "pg-boss error"));
		await instance.start();

		for (const job of jobs.values()) {
			await instance.createQueue(job.name);
			await instance.schedule(job.name, job.cron);
			await instance.work(job.name, createHandler(job.name));
			log.info("Scheduled maintenance job %s (%s)", job.name, job.cron);
		}

		boss = instance;
		log.info("Maintenance scheduler started (schema: %s)", options.schema);
	}

	async function stop(): Promise<void> {
		if (!boss) {
			return;
		}
		await boss.stop();
		boss = undefined;
		log.info("Maintenance scheduler stopped");
	}
}
