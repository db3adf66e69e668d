import { ServiceError } from '@docqa/service-template';

export class LLMFailure extends ServiceError {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, 'LLM_FAILURE', 502, options);
    }
}
