import 'dotenv/config';
import { cert, initializeApp } from 'firebase-admin/app';
import { getFirestore, Timestamp } from 'firebase-admin/firestore';
import { readFileSync } from 'fs';
import { join } from 'path';

interface SeedAccount {
  userId: string;
  displayName: string;
  accountReference: string;
  bills: Array<{
    id: string;
    periodStart: string;
    periodEnd: string;
    amount: number;
    lineItems: Array<{ description: string; amount: number }>;
  }>;
}

// Firestore allows at most 500 writes per batch
const BATCH_SIZE = 500;

// Point FIRESTORE_EMULATOR_HOST at a local emulator, or set GOOGLE_APPLICATION_CREDENTIALS_JSON
function connect() {
  const serviceAccountJson = process.env.GOOGLE_APPLICATION_CREDENTIALS_JSON;
  initializeApp(serviceAccountJson ? { credential: cert(JSON.parse(serviceAccountJson)) } : { projectId: process.env.GCLOUD_PROJECT ?? 'demo-bill-assistant' });
  return getFirestore();
}

export function inBatches<T>(items: T[], size = BATCH_SIZE): T[][] {
  const batches: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    batches.push(items.slice(i, i + size));
  }
  return batches;
}

function loadSeedFile(filename: string): SeedAccount[] {
  const filePath = join(__dirname, filename);
  return JSON.parse(readFileSync(filePath, 'utf-8'));
}

export async function seedBillingAccounts(filename = 'sample-billing-data.json') {
  console.log('🔄 Seeding billing accounts...');
  const db = connect();
  const accounts = loadSeedFile(filename);

  for (const account of accounts) {
    const accountRef = db.collection('billingAccounts').doc(account.userId);
    await accountRef.set({
      displayName: account.displayName,
      accountReference: account.accountReference,
    });

    let written = 0;
    for (const chunk of inBatches(account.bills)) {
      const batch = db.batch();
      chunk.forEach(bill => {
        batch.set(accountRef.collection('bills').doc(bill.id), {
          periodStart: bill.periodStart,
          periodEnd: bill.periodEnd,
          amount: bill.amount,
          lineItems: bill.lineItems,
          issuedAt: Timestamp.now(),
        });
      });
      await batch.commit();
      written += chunk.length;
      console.log(`   - ${account.userId}: ${written}/${account.bills.length} bills`);
    }
  }

  console.log(`✅ Seeded ${accounts.length} billing accounts`);
}

if (require.main === module) {
  seedBillingAccounts(process.argv[2]).catch(error => {
    console.error('❌ Seeding failed:', error);
    process.exit(1);
  });
}
