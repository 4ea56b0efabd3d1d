export { TableRegistry, TableError, isValidTableId, type Table, type TableRegistryConfig } from "./tableRegistry.js";
export { EventLog } from "./eventLog.js";
