import JSZip from 'jszip';
import { EmailAttachment, ExtractionResult } from '../../common/interfaces';
import { errorMessage } from '../../common/errors';
import { decodeFailure } from './result';

/**
 * Archive ZIP générique: on liste les noms d'entrées, on ne lit jamais leur contenu.
 * Une correspondance ici porte sur le listing, pas sur les fichiers archivés.
 */
export async function extractZipListing(attachment: EmailAttachment): Promise<ExtractionResult> {
  try {
    const zip = await JSZip.loadAsync(attachment.rawBytes);
    const entries: string[] = [];
    zip.forEach((_relativePath, file) => {
      entries.push(file.name);
    });

    return { kind: 'listing', entries, text: entries.join('\n') };
  } catch (error) {
    return decodeFailure(`archive ZIP illisible: ${errorMessage(error)}`);
  }
}
