export { useToneAudio } from './useToneAudio';
export type { ToneAudioResult } from './useToneAudio';
