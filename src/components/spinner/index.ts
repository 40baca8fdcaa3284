export { SpinnerField } from './SpinnerField';
export { LobeChorus } from './LobeChorus';
export { parseStartupOptions } from './config';
