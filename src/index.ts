export * from './engines/pathfx';
export { PATH_FX } from './shared/design';
export {
    getPathFxDebugConfig,
    resetPathFxDebugConfig,
    type PathFxDebugConfig,
} from './debug/PathFxDebugFlags';
