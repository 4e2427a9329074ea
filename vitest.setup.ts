import { config } from 'dotenv';

// Variables already set by the environment (CI) win over .env
config({ override: false });
