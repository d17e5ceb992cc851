import dotenv from 'dotenv';

// Imported first by every module that reads process.env at load time
dotenv.config();
