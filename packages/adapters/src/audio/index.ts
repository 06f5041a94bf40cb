export {
  WebAudioSink,
  AudioInitError,
  type WebAudioSinkConfig,
  type AudioContextLike,
} from "./WebAudioSink";
