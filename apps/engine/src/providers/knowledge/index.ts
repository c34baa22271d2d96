export {
    KnowledgeGraphProvider,
    KnowledgeGraphSettings,
    HttpKnowledgeGraphProvider,
    FallbackKnowledgeGraphProvider,
    buildFallbackKnowledgeGraph,
} from './KnowledgeGraphProvider';
