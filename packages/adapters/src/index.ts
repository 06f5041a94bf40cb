export * from "./audio";
export * from "./input";
export { animationFrameScheduler } from "./frames/animationFrameScheduler";
