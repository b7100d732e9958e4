export { fetchTextWithTimeout } from './http-client';
export { SystemClock } from './system-clock';
