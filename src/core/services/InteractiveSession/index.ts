export { InteractiveSessionTag, InteractiveSessionLive } from "./InteractiveSession";
export type { InteractiveSession, SessionSnapshot, RegistrationError } from "./InteractiveSession";
