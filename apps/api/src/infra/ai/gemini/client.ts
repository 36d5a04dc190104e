import { GoogleGenerativeAI } from '@google/generative-ai';

/**
 * Creates a Gemini client session with the provided API key.
 * One session is shared by the text generator and the embedder.
 */
export function createGeminiClient(apiKey: string) {
    return new GoogleGenerativeAI(apiKey);
}
