export { registerCalculateCommand } from "./calculate.js";
export { registerCheckCommand } from "./check.js";
export { registerPoliciesCommand } from "./policies.js";
export { registerDemoCommand } from "./demo.js";
export {
    EXIT_ERROR,
    EXIT_OK,
    EXIT_STALE,
    failCommand,
    formatError,
    type CliContext,
} from "./context.js";
