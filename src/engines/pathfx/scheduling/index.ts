export { PathSamplerTicker, type TickSource } from './PathSamplerTicker';
