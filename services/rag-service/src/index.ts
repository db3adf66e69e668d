import 'dotenv/config';
import { createService, errorHandler, logger, startService } from '@docqa/service-template';
import { getEmbeddingProvider, getVectorStore } from '@docqa/retrieval';
import { loadConfig } from './config';
import { getLLMProvider } from './providers';
import { loadPrompt } from './prompts';
import { AnsweringService } from './rag/answerService';
import { createRouter } from './routes';

const config = loadConfig();
const app = createService('rag-service');

const prompt = loadPrompt('rag_answer_prompt.md');
const llm = getLLMProvider(config.llm);

const service = new AnsweringService({
    embedder: getEmbeddingProvider(config.retrieval.embedding),
    store: getVectorStore(config.retrieval.store),
    llm,
    template: prompt.content,
    options: {
        collection: config.retrieval.collection,
        topK: config.retrieval.maxSearchResults,
        temperature: config.temperature,
        maxTokens: config.maxTokens
    }
});

app.use(createRouter(service, config.retrieval.collection));
app.use(errorHandler);

logger.info('Answering service ready', {
    collection: config.retrieval.collection,
    llm_provider: llm.name,
    prompt_version: prompt.version
});

startService(app, config.port);
