import { logger } from '@docqa/service-template';
import { LLMProvider } from './base';
import { MockLLMProvider } from './mock';
import { OpenAICompatibleProvider } from './openai';
import { LLMConfig } from '../config';

export * from './base';
export { OpenAICompatibleProvider } from './openai';
export { MockLLMProvider } from './mock';

export const GROQ_BASE_URL = 'https://api.groq.com/openai/v1';
export const GROQ_DEFAULT_MODEL = 'openai/gpt-oss-20b';

const requireKey = (config: LLMConfig, variable: string): string => {
    if (!config.apiKey) {
        throw new Error(`${variable} is required when LLM_PROVIDER=${config.provider}`);
    }
    return config.apiKey;
};

export function getLLMProvider(config: LLMConfig): LLMProvider {
    switch (config.provider) {
        case 'mock':
            return new MockLLMProvider();
        case 'groq':
            return new OpenAICompatibleProvider({
                name: 'groq',
                apiKey: requireKey(config, 'GROQ_API_KEY'),
                baseUrl: config.baseUrl || GROQ_BASE_URL,
                defaultModel: config.model || GROQ_DEFAULT_MODEL
            });
        case 'openai':
            return new OpenAICompatibleProvider({
                name: 'openai',
                apiKey: requireKey(config, 'LLM_API_KEY'),
                baseUrl: config.baseUrl, // Optional, defaults to OpenAI
                defaultModel: config.model
            });
        case 'local': // Ollama/vLLM
            return new OpenAICompatibleProvider({
                name: 'local',
                apiKey: config.apiKey || 'ollama', // Often ignored by Ollama
                baseUrl: config.baseUrl || 'http://localhost:11434/v1',
                defaultModel: config.model || 'llama3.1'
            });
        default:
            logger.warn(`Unknown LLM_PROVIDER '${config.provider}', defaulting to mock.`);
            return new MockLLMProvider();
    }
}
