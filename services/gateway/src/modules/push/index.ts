export { PushMessage, type MusicReply, type NewsArticle, type VideoReply } from './push-message.js';
