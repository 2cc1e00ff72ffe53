export { VideoGridStrategy, VIDEO_GRID_ALGORITHM, type VideoGridOptions } from './strategy.js'
export { SELECTORS as VIDEO_GRID_SELECTORS } from './selectors.js'
