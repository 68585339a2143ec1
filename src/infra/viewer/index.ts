export { ImageViewer, buildViewerArgs, type Viewer } from './image-viewer.js';
