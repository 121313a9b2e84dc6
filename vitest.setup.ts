// Suppress logger output during tests
process.env.GRAPHQL_LAMBDA_LOG_LEVEL = 'silent'

// Keep the switches off unless a test turns them on
delete process.env.GRAPHQL_LAMBDA_ACCESS_LOG
delete process.env.GRAPHQL_LAMBDA_GZIP
delete process.env.GRAPHQL_LAMBDA_SHOW_FAILURE_CAUSE
