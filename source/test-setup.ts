import os from 'node:os';
import path from 'node:path';

// Keep test runs away from real log directories and remote backends.
process.env['FIND_LOG_DIR'] =
	process.env['FIND_LOG_DIR'] ??
	path.join(os.tmpdir(), `federated-find-test-logs-${process.pid}`);

delete process.env['FIND_STORE_URL'];
delete process.env['FIND_EMBEDDING_API_URL'];
