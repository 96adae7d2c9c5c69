export { Session, type SessionDeps, type LoadMode, type LoadContinuation } from "./session";
