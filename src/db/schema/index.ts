export { users } from "./users.js";
export { projects } from "./projects.js";
export { versions } from "./versions.js";
export { pats } from "./pats.js";
export { reportTypes } from "./report-types.js";
export { reports } from "./reports.js";
export { threads, threadMembers, threadMessages } from "./threads.js";
