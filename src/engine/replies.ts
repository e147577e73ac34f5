/**
 * Fixed reply texts the engine returns without generation
 */

import type { Language } from '../types'

export interface ReplyTexts {
  /** Every tier failed */
  apology: string
  /** The merchant has no catalog indexed */
  notAvailable: string
  /** Unexpected internal failure */
  technicalDifficulty: string
}

export const REPLIES: Record<Language, ReplyTexts> = {
  en: {
    apology: "I'm sorry, I couldn't put an answer together just now. Could you ask me again in a moment?",
    notAvailable: "Sorry, I can't help with this store's catalog right now. Please check back soon.",
    technicalDifficulty: "We're having some technical difficulties. Please try again shortly.",
  },
  es: {
    apology: 'Lo siento, no pude preparar una respuesta en este momento. ¿Podrías preguntarme de nuevo en un momento?',
    notAvailable: 'Lo siento, ahora mismo no puedo ayudarte con el catálogo de esta tienda. Vuelve a intentarlo pronto.',
    technicalDifficulty: 'Estamos teniendo algunos problemas técnicos. Por favor, inténtalo de nuevo en breve.',
  },
  fr: {
    apology: "Désolé, je n'ai pas pu préparer de réponse pour le moment. Pourriez-vous reposer la question dans un instant ?",
    notAvailable: "Désolé, je ne peux pas vous aider avec le catalogue de ce magasin pour le moment. Revenez bientôt.",
    technicalDifficulty: 'Nous rencontrons des difficultés techniques. Veuillez réessayer dans un instant.',
  },
}
