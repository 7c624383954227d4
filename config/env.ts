import dotenv from 'dotenv';
import path from 'path';

// Load environment variables from .env file
dotenv.config({ path: path.resolve(__dirname, '../.env') });

type Environment = 'development' | 'production' | 'test';

interface Config {
    env: Environment;
    logLevel: string;
    enableFileLogging: boolean;
    logDir: string;
}

const parseEnvironment = (value: string | undefined): Environment => {
    if (value === 'production' || value === 'test') {
        return value;
    }
    return 'development';
};

const config: Config = {
    env: parseEnvironment(process.env.NODE_ENV),
    logLevel: process.env.LOG_LEVEL || 'info',
    enableFileLogging: process.env.ENABLE_FILE_LOGGING === 'true',
    logDir: process.env.LOG_DIR || path.join(__dirname, '../logs'),
};

export default config;
