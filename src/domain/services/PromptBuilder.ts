import { ProductInfo } from '../entities/ProductInfo';
import { PlatformSpec } from '../entities/PlatformSpec';
import { languageInstructionFor } from '../entities/Language';

/**
 * Marketing Post Prompt
 *
 * Composes the instruction block sent as the user message for one platform.
 * Product fields are interpolated verbatim.
 */

export const DEFAULT_SYSTEM_PROMPT =
    'You are an expert social media marketing content creator, specialized in writing engaging and effective posts.';

export function buildPrompt(
    productInfo: ProductInfo,
    platformSpec: PlatformSpec,
    languageCode: string,
    platformName: string = 'social media'
): string {
    const languageInstruction = languageInstructionFor(languageCode);

    return `You are an expert in digital marketing and social media content creation.

Product Information:
- Title: ${productInfo.title}
- Description: ${productInfo.description}
- Price: ${productInfo.price}
- URL: ${productInfo.url}

Create a professional marketing post for ${platformName} with these specifications:
- Maximum length: ${platformSpec.maxLength} characters
- Style: ${platformSpec.style}
- Format: ${platformSpec.format}

The post must:
1. Grab attention from the first line
2. Highlight key benefits
3. Include a clear call-to-action
4. ${languageInstruction}
5. Use emojis strategically

Write ONLY the post without any preambles or additional explanations.`;
}
