// model_registry.ts - known models and what their endpoints accept
export interface ModelInfo {
    id: string;
    contextWindow: number;
    supportsJsonMode: boolean;
}

export class ModelRegistry {
    private static instance: ModelRegistry;
    private models: Map<string, ModelInfo> = new Map();

    private constructor() {
        this.initializeDefaults();
    }

    public static getInstance(): ModelRegistry {
        if (!ModelRegistry.instance) {
            ModelRegistry.instance = new ModelRegistry();
        }
        return ModelRegistry.instance;
    }

    private initializeDefaults() {
        const defaults: ModelInfo[] = [
            { id: 'gpt-3.5-turbo', contextWindow: 16385, supportsJsonMode: true },
            { id: 'gpt-4o-mini', contextWindow: 128000, supportsJsonMode: true },
            { id: 'gpt-4o', contextWindow: 128000, supportsJsonMode: true },
            { id: 'deepseek-chat', contextWindow: 64000, supportsJsonMode: true },
            // The reasoning endpoint rejects response_format
            { id: 'deepseek-reasoner', contextWindow: 64000, supportsJsonMode: false },
            { id: 'meta-llama_Meta-Llama-3-8B', contextWindow: 8192, supportsJsonMode: false },
        ];

        defaults.forEach(m => this.models.set(m.id, m));
    }

    public getModelInfo(modelId: string): ModelInfo | undefined {
        return this.models.get(modelId);
    }

    public registerModel(info: ModelInfo) {
        this.models.set(info.id, info);
    }

    /** Unknown models are assumed not to support JSON mode. */
    public supportsJsonMode(modelId: string): boolean {
        return this.models.get(modelId)?.supportsJsonMode ?? false;
    }
}
