// Imported first by the entry point so configuration sees the .env values
import dotenv from 'dotenv';
import path from 'node:path';

// Running from the repository root or from inside the gateway workspace
dotenv.config({ path: path.resolve(process.cwd(), '.env') });
dotenv.config({ path: path.resolve(process.cwd(), '..', '.env') });
