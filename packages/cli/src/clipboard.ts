import type { ClipboardGateway } from '@avrodeck/engine';
import clipboard from 'clipboardy';

export const systemClipboard: ClipboardGateway = {
  write: (text) => clipboard.write(text),
};
