// Page extraction utilities
export {
  type ExtractOptions,
  extractFields,
  extractItemLinks,
} from './PageExtractor';
