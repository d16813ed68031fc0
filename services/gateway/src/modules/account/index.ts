export { AccountTools, type SceneQrcode } from './service.js';
