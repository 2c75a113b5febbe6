export {
  HttpRenderClient,
  buildRenderPayload,
  isTransientStatus,
  RENDER_PRESETS,
  RENDER_QUALITIES,
} from './render-client.js';
export type {
  RenderClient,
  RenderRequest,
  RenderPayload,
  RenderQuality,
  RenderSettings,
  HttpRenderClientOptions,
} from './render-client.js';
