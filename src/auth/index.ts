export { Capability, CapabilityAuthority, Role } from "./capabilities.js";
