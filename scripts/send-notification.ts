#!/usr/bin/env tsx
import { createNotifierFromEnv } from '../src/notifier/factory.js';

async function main() {
  const [title, ...rest] = process.argv.slice(2);
  if (!title) {
    console.error('usage: npm run notify -- <title> [content...]');
    process.exitCode = 1;
    return;
  }

  const notifier = createNotifierFromEnv();
  const result = await notifier.push(title, rest.join(' '));
  console.log(result.ok ? `Delivered (pushid ${result.pushId ?? 'n/a'})` : `Failed: ${result.message}`);
  if (!result.ok) process.exitCode = 1;
}

main().catch((err: unknown) => {
  console.error(err);
  process.exitCode = 1;
});
