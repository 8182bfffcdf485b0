export * from "./core/Database";
export * from "./util/Sequelize";

/**
 * Something to stop when the server shuts down.
 */
export interface ExitHandler {
	stop(code?: number): void | Promise<void>;
}
