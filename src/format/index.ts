export {
  type ContainerHeader,
  type Container,
  MAGIC_BYTES,
  FORMAT_VERSION,
  HEADER_BASE_SIZE,
  SYMBOL_ENTRY_SIZE,
  MAX_ORIGINAL_LENGTH,
  createHeader,
  calculateHeaderSize,
  serializeHeader,
  deserializeHeader,
  validateHeader,
  combineHeaderAndPayload,
  splitHeaderAndPayload,
  serializeContainer,
  deserializeContainer,
  isContainerFormat,
} from './header.js';
