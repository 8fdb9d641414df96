import { createApp } from './presentation/app';
import { loadConfig, validateConfig } from './config';

async function main(): Promise<void> {
    console.log('🚀 Social Post Generator - starting server...');

    const config = loadConfig();
    const configErrors = validateConfig(config);

    if (configErrors.length > 0) {
        console.error('❌ Configuration validation failed:');
        configErrors.forEach((error) => console.error(`  - ${error}`));
        process.exit(1);
    }

    if (!config.llmApiKey) {
        console.warn('⚠️  GROQ_API_KEY is not set: requests must supply their own API key');
    }

    const app = createApp(config);

    app.listen(config.port, () => {
        console.log(`✅ Server running on http://localhost:${config.port}`);
        console.log(`   Environment: ${config.environment}`);
        console.log(`   Model: ${config.llmModel}`);
    });
}

main().catch((error) => {
    console.error('💥 Fatal error during bootstrap:', error);
    process.exit(1);
});
