export { createDatabaseCheck } from "./DatabaseCheck";
export { createStuckTaskCheck } from "./StuckTaskCheck";
