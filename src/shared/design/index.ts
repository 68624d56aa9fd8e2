export { PATH_FX } from './PathDefaults';
