import type {
  AccountManager,
  UpdateAccountCommand,
} from '../../application/accounts/accountManager.js';
import type { AuthenticationSession } from '../../application/auth/session.js';
import { SessionLockedError, SelfDeletionError } from '../../domain/auth/errors.js';
import type { AirQualityReport } from '../airQuality/airQualityClient.js';
import { createLogger } from '../logger.js';
import { describeError } from './errorMessages.js';
import { InputClosedError, type Prompter } from './prompter.js';
import { renderAccount, renderAccountTable, renderAirQualityReport } from './reports.js';

export interface AirQualitySource {
  fetchCity(city: string): Promise<AirQualityReport>;
}

export interface ConsoleAppOptions {
  prompter: Prompter;
  accounts: AccountManager;
  session: AuthenticationSession;
  airQuality: AirQualitySource;
  defaultCity: string;
}

export const EXIT_OK = 0;
export const EXIT_DENIED = 1;

type MainMenuExit = 'logout' | 'exit';

const log = createLogger('console');

const MAIN_MENU = [
  'MAIN MENU',
  '  1. Manage accounts',
  '  2. Air quality report',
  '  3. Log out',
  '  4. Exit',
];

const ACCOUNTS_MENU = [
  'ACCOUNTS',
  '  1. Create account',
  '  2. Find account by username',
  '  3. List accounts',
  '  4. Update account',
  '  5. Delete account',
  '  6. Back',
];

function parseId(raw: string): number | null {
  const trimmed = raw.trim();
  if (!/^\d+$/.test(trimmed)) {
    return null;
  }
  const id = Number(trimmed);
  return Number.isSafeInteger(id) && id > 0 ? id : null;
}

/**
 * Interactive console: login gate, then menus for accounts and air quality.
 */
export class ConsoleApp {
  private readonly prompter: Prompter;
  private readonly accounts: AccountManager;
  private readonly session: AuthenticationSession;
  private readonly airQuality: AirQualitySource;
  private readonly defaultCity: string;

  constructor(options: ConsoleAppOptions) {
    this.prompter = options.prompter;
    this.accounts = options.accounts;
    this.session = options.session;
    this.airQuality = options.airQuality;
    this.defaultCity = options.defaultCity;
  }

  /**
   * Resolves to the process exit code: 0 on a normal exit or end of input,
   * 1 when the login budget is exhausted.
   */
  async run(): Promise<number> {
    this.printBlock(['='.repeat(70), '  ACCOUNT CONSOLE', '='.repeat(70)]);

    try {
      for (;;) {
        if (!(await this.login())) {
          return EXIT_DENIED;
        }
        if ((await this.mainMenu()) === 'exit') {
          this.prompter.print('Goodbye');
          return EXIT_OK;
        }
      }
    } catch (error) {
      if (error instanceof InputClosedError) {
        return EXIT_OK;
      }
      throw error;
    }
  }

  private async login(): Promise<boolean> {
    this.prompter.print('LOGIN');

    while (this.session.state === 'unauthenticated') {
      const attemptNumber = this.session.maxAttempts - this.session.attemptsRemaining + 1;
      this.prompter.print(`Attempt ${attemptNumber} of ${this.session.maxAttempts}`);

      const username = (await this.prompter.ask('Username: ')).trim();
      const password = await this.prompter.ask('Password: ');
      if (!username || !password) {
        this.prompter.print('Username and password are required');
        continue;
      }

      try {
        const result = await this.session.attempt(username, password);
        switch (result.outcome) {
          case 'authenticated':
            this.prompter.print(`Welcome, ${result.account.username} (${result.account.role})`);
            return true;
          case 'rejected':
            this.prompter.print('Invalid username or password');
            this.prompter.print(`${result.attemptsRemaining} attempt(s) remaining`);
            break;
          case 'locked':
            this.printDenied();
            return false;
        }
      } catch (error) {
        if (error instanceof SessionLockedError) {
          this.printDenied();
          return false;
        }
        this.prompter.print(`Error: ${describeError(error)}`);
      }
    }

    return this.session.state === 'authenticated';
  }

  private async mainMenu(): Promise<MainMenuExit> {
    for (;;) {
      this.printBlock(MAIN_MENU);
      switch (await this.readChoice(MAIN_MENU.length - 1)) {
        case 1:
          await this.accountsMenu();
          break;
        case 2:
          await this.airQualityReport();
          break;
        case 3:
          this.session.logout();
          this.prompter.print('Signed out');
          return 'logout';
        case 4:
          return 'exit';
      }
    }
  }

  private async accountsMenu(): Promise<void> {
    for (;;) {
      this.printBlock(ACCOUNTS_MENU);
      switch (await this.readChoice(ACCOUNTS_MENU.length - 1)) {
        case 1:
          await this.guard(() => this.createAccount());
          break;
        case 2:
          await this.guard(() => this.findAccount());
          break;
        case 3:
          await this.guard(() => this.listAccounts());
          break;
        case 4:
          await this.guard(() => this.updateAccount());
          break;
        case 5:
          await this.guard(() => this.deleteAccount());
          break;
        case 6:
          return;
      }
    }
  }

  private async createAccount(): Promise<void> {
    this.prompter.print('CREATE ACCOUNT');
    const username = await this.prompter.ask('Username: ');
    const email = await this.prompter.ask('Email: ');
    const password = await this.prompter.ask('Password: ');
    const confirmation = await this.prompter.ask('Confirm password: ');
    const role = (await this.prompter.ask('Role (user/admin) [user]: ')).trim() || 'user';

    if (password !== confirmation) {
      this.prompter.print('Passwords do not match');
      return;
    }

    const account = await this.accounts.create({ username, email, password, role });
    this.prompter.print(`Account '${account.username}' created with id ${account.id}`);
  }

  private async findAccount(): Promise<void> {
    this.prompter.print('FIND ACCOUNT');
    const username = (await this.prompter.ask('Username: ')).trim();
    if (!username) {
      this.prompter.print('A username is required');
      return;
    }

    const account = await this.accounts.findByUsername(username);
    this.printBlock(renderAccount(account));
  }

  private async listAccounts(): Promise<void> {
    this.prompter.print('ACCOUNTS');
    this.printBlock(renderAccountTable(await this.accounts.list()));
  }

  private async updateAccount(): Promise<void> {
    this.prompter.print('UPDATE ACCOUNT');
    const id = await this.askId('Account id: ');
    if (id === null) {
      return;
    }

    const current = await this.accounts.findById(id);
    this.prompter.print(`Updating '${current.username}', leave a field blank to keep it`);

    const email = (await this.prompter.ask(`Email [${current.email}]: `)).trim();
    const role = (await this.prompter.ask(`Role [${current.role}]: `)).trim();
    const password = await this.prompter.ask('New password [blank keeps the current one]: ');

    const command: UpdateAccountCommand = {};
    if (email) command.email = email;
    if (role) command.role = role;
    if (password) command.password = password;

    if (Object.keys(command).length === 0) {
      this.prompter.print('No changes made');
      return;
    }

    await this.accounts.update(id, command);
    this.prompter.print(`Account '${current.username}' updated`);
  }

  private async deleteAccount(): Promise<void> {
    this.prompter.print('DELETE ACCOUNT');
    const id = await this.askId('Account id: ');
    if (id === null) {
      return;
    }

    const me = this.session.requireAccount();
    if (id === me.id) {
      throw new SelfDeletionError();
    }

    const target = await this.accounts.findById(id);
    const answer = (await this.prompter.ask(`Delete account '${target.username}'? (y/n): `))
      .trim()
      .toLowerCase();
    if (answer !== 'y' && answer !== 'yes') {
      this.prompter.print('Operation cancelled');
      return;
    }

    await this.accounts.delete(id, me.id);
    this.prompter.print(`Account '${target.username}' deleted`);
  }

  private async airQualityReport(): Promise<void> {
    const city =
      (await this.prompter.ask(`City [${this.defaultCity}]: `)).trim() || this.defaultCity;
    this.prompter.print('Fetching air quality data...');

    await this.guard(async () => {
      const report = await this.airQuality.fetchCity(city);
      this.printBlock(renderAirQualityReport(report));
    });
  }

  private async askId(question: string): Promise<number | null> {
    const id = parseId(await this.prompter.ask(question));
    if (id === null) {
      this.prompter.print('The id must be a positive whole number');
    }
    return id;
  }

  /**
   * Read a menu choice in 1..max; anything else is reported and yields null.
   */
  private async readChoice(max: number): Promise<number | null> {
    const choice = parseId(await this.prompter.ask('Select an option: '));
    if (choice === null || choice > max) {
      this.prompter.print('Invalid option');
      return null;
    }
    return choice;
  }

  /**
   * Run one menu operation, reporting its failure and returning to the menu.
   */
  private async guard(operation: () => Promise<void>): Promise<void> {
    try {
      await operation();
    } catch (error) {
      if (error instanceof InputClosedError) {
        throw error;
      }
      log.debug('Console operation failed', { error });
      this.prompter.print(`Error: ${describeError(error)}`);
    }
  }

  private printDenied(): void {
    this.printBlock([
      'ACCESS DENIED: maximum number of login attempts reached',
      'The program will now close',
    ]);
  }

  private printBlock(lines: readonly string[]): void {
    for (const line of lines) {
      this.prompter.print(line);
    }
  }
}
