export { parseCref, type Cref, type CrefKind } from "./cref.js";
