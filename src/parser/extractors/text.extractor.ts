import { EmailAttachment, ExtractionResult } from '../../common/interfaces';
import { DecodeError, errorMessage } from '../../common/errors';
import { decodeText } from './text-decoding';
import { decodeFailure, textResult } from './result';

/**
 * Texte brut et CSV: le contenu décodé est cherché tel quel
 * (un champ CSV entre guillemets reste une sous-chaîne du texte).
 */
export async function extractText(attachment: EmailAttachment): Promise<ExtractionResult> {
  try {
    return textResult(decodeText(attachment.rawBytes, attachment.filename));
  } catch (error) {
    if (error instanceof DecodeError) return decodeFailure(error.reason);
    return decodeFailure(errorMessage(error));
  }
}
