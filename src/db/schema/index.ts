export { researchSessions } from "./research-sessions.ts";
