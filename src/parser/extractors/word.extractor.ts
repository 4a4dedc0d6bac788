import * as mammoth from 'mammoth';
import { EmailAttachment, ExtractionResult } from '../../common/interfaces';
import { errorMessage } from '../../common/errors';
import { decodeFailure, textResult } from './result';

// Corps du document uniquement (ni images, ni en-têtes/pieds de page)
export async function extractWord(attachment: EmailAttachment): Promise<ExtractionResult> {
  try {
    const result = await mammoth.extractRawText({ buffer: attachment.rawBytes });
    return textResult(result.value);
  } catch (error) {
    return decodeFailure(`document Word illisible: ${errorMessage(error)}`);
  }
}
