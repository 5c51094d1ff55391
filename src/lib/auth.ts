import { betterAuth } from 'better-auth';
import { mongodbAdapter } from 'better-auth/adapters/mongodb';
import { MongoClient } from 'mongodb';
import { AccountService } from '../services/accountService';

// Create MongoDB client
const mongoUri = process.env.MONGODB_URI;
if (!mongoUri) {
  throw new Error('MONGODB_URI is required');
}
const client = new MongoClient(mongoUri);
const db = client.db(); // Uses database name from connection string

const authSecret = process.env.BETTER_AUTH_SECRET;
if (!authSecret) {
  throw new Error('BETTER_AUTH_SECRET is required');
}

const authBaseUrl = process.env.BETTER_AUTH_URL;
if (!authBaseUrl) {
  throw new Error('BETTER_AUTH_URL is required');
}

const googleClientId = process.env.GOOGLE_CLIENT_ID;
const googleClientSecret = process.env.GOOGLE_CLIENT_SECRET;
const githubClientId = process.env.GITHUB_CLIENT_ID;
const githubClientSecret = process.env.GITHUB_CLIENT_SECRET;

const accountService = new AccountService();

export const auth: ReturnType<typeof betterAuth> = betterAuth({
  database: mongodbAdapter(db, {
    client,
    usePlural: false,
    transaction: false, // Disable transactions for standalone MongoDB
  }),
  secret: authSecret,
  baseURL: authBaseUrl,
  basePath: process.env.BETTER_AUTH_BASEPATH ?? '/auth',
  socialProviders: {
    ...(googleClientId && googleClientSecret
      ? {
          google: {
            clientId: googleClientId,
            clientSecret: googleClientSecret,
          },
        }
      : {}),
    ...(githubClientId && githubClientSecret
      ? {
          github: {
            clientId: githubClientId,
            clientSecret: githubClientSecret,
          },
        }
      : {}),
  },
  trustedOrigins: [
    'http://localhost:3000',
    'http://localhost:5173',
    ...(process.env.CORS_ORIGIN ? process.env.CORS_ORIGIN.split(',').map((o) => o.trim()) : []),
  ],
  emailAndPassword: {
    enabled: false,
  },
  // Every auth user gets a MarketPulse account row with the same id
  databaseHooks: {
    user: {
      create: {
        after: async (user) => {
          await accountService.provisionAccount({
            userId: user.id,
            email: user.email,
            name: user.name,
          });
        },
      },
    },
  },
  rateLimit: {
    storage: 'database', // Uses MongoDB for rate limiting storage
  },
  session: {
    expiresIn: 60 * 60 * 24 * 7, // 7 days
    updateAge: 60 * 60 * 24, // 1 day
  },
});

export { client };
