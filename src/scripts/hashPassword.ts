import { loadPasswordPolicy } from '../infra/config.js';
import { PasswordHasher } from '../domain/auth/password.js';
import { InvalidInputError } from '../domain/auth/errors.js';
import { ReadlinePrompter } from '../infra/console/prompter.js';
import { runScript } from './runScript.js';

// Prints an encoded hash for seeding accounts by hand.
// Usage: npm run hash-password -- <password>
runScript('hash-password', async () => {
  const policy = loadPasswordPolicy();
  const hasher = new PasswordHasher({
    cost: policy.passwordHashCost,
    minLength: policy.passwordMinLength,
  });

  let password: string | undefined = process.argv[2];
  if (password === undefined) {
    const prompter = new ReadlinePrompter(process.stdin, process.stderr);
    try {
      password = await prompter.ask('Password: ');
    } finally {
      prompter.close();
    }
  }

  try {
    console.log(await hasher.hash(password));
    return 0;
  } catch (error) {
    if (error instanceof InvalidInputError) {
      console.error(error.message);
      return 1;
    }
    throw error;
  }
});
