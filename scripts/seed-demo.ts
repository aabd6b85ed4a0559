/// <reference types="node" />
/**
 * Seed script creating demo users and events, with one full waitlisted event.
 * Run with: npx tsx scripts/seed-demo.ts
 */
import 'dotenv/config';
import { createUser, userExists } from '../src/modules/users/users.service.js';
import { createEvent, eventExists } from '../src/modules/events/events.service.js';
import { registerUser } from '../src/modules/registrations/registrations.service.js';
import { store } from '../src/database/client.js';

const DEMO_USERS = [
  { userId: 'demo-alice', name: 'Alice Martin' },
  { userId: 'demo-bob', name: 'Bob Chen' },
  { userId: 'demo-carol', name: 'Carol Diaz' },
];

const DEMO_EVENTS = [
  { eventId: 'demo-workshop', name: 'TypeScript Workshop', capacity: 1, hasWaitlist: true },
  { eventId: 'demo-meetup', name: 'Community Meetup', capacity: 50, hasWaitlist: false },
];

async function main() {
  console.log('Seeding demo data...');

  for (const user of DEMO_USERS) {
    if (await userExists(user.userId)) {
      console.log(`User ${user.userId} already exists, skipping`);
      continue;
    }
    await createUser(user);
    console.log(`Created user ${user.userId}`);
  }

  for (const event of DEMO_EVENTS) {
    if (await eventExists(event.eventId)) {
      console.log(`Event ${event.eventId} already exists, skipping`);
      continue;
    }
    await createEvent(event);
    console.log(`Created event ${event.eventId}`);
  }

  // Fill the workshop so the remaining users land on its waitlist
  for (const user of DEMO_USERS) {
    const outcome = await registerUser(user.userId, 'demo-workshop').catch((error: unknown) => {
      console.log(`Skipping ${user.userId}:`, error instanceof Error ? error.message : error);
      return null;
    });
    if (outcome) {
      console.log(`${user.userId} -> ${outcome.status}`);
    }
  }

  console.log('Demo data ready');
}

main()
  .catch((error: unknown) => {
    console.error('Seeding failed:', error);
    process.exitCode = 1;
  })
  .finally(() => store.close());
