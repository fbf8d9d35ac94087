process.env.NODE_ENV = "test";
process.env.OPENAI_API_KEY ??= "test-openai-key";
process.env.LOG_LEVEL ??= "silent";
delete process.env.AZURE_OPENAI_ENDPOINT;
