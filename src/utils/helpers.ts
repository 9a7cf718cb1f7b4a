import clipboard from 'clipboardy';
import { UI } from '../ui/renderer.js';

export async function copyToClipboard(text: string): Promise<boolean> {
  try {
    await clipboard.write(text);
    return true;
  } catch (err) {
    console.log(UI.warning(`Failed to copy to clipboard: ${err instanceof Error ? err.message : String(err)}`));
    return false;
  }
}
