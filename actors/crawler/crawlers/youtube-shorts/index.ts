import { registerSite } from '../../core';
import { youtubeShortsDefinition } from './config';

registerSite(youtubeShortsDefinition);

export {
  YOUTUBE_SHORTS_CONFIG,
  YOUTUBE_SHORTS_SELECTORS,
  youtubeShortsDefinition,
} from './config';
