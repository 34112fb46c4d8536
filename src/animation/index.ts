export { AnimationDriver } from "./AnimationDriver";
export type { AnimationHooks } from "./AnimationDriver";
export { FrameSequence } from "./FrameSequence";
export type { AnimationFrame } from "./FrameSequence";
export { CLEAR_SCREEN, runPreview } from "./PreviewLoop";
export type { PreviewOutput } from "./PreviewLoop";
