import { loadDocument } from '../embed/DocumentLoader';
import { OutputSink } from '../render/XmlRenderer';
import { LoadDocumentFn } from './insert';

/**
 * Prints `filePath` with every embedded file placeholder resolved. Works
 * offline; useful for checking an entry file before sending it.
 */
export function runExpand(filePath: string, out: OutputSink = process.stdout, loadFn: LoadDocumentFn = loadDocument): string {
    const content = loadFn(filePath);
    out.write(content);
    return content;
}
