export { encodeGif, GifFileSink, writeOutput } from "./GifFileSink";
export type { GifEncodeOptions } from "./GifFileSink";
export { encodePng, PngFileSink } from "./PngFileSink";
export type { AnimationSink, ImageSink } from "./RasterSink";
