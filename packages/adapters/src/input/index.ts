export { DomInputSource, type InputTarget } from "./DomInputSource";
