import * as log from '../utils/logger';
import { AuthenticationError } from '../common/errors';
import type { StageTimeouts } from '../common/config';
import type { PageDriver } from '../browser/page_driver';
import {
  CREDENTIAL_ERROR,
  EMAIL_INPUT,
  PASSWORD_INPUT,
  POST_PASSWORD_SIGNAL,
  POST_VERIFICATION_SIGNAL,
  STAY_SIGNED_IN_ACCEPT,
  STAY_SIGNED_IN_PROMPT,
  SUBMIT_BUTTON,
  VERIFICATION_PROMPT,
} from './selectors';

export interface Credentials {
  username: string;
  password: string;
}

export type LoginOutcome = {
  verificationPrompted: boolean;
  staySignedInAccepted: boolean;
};

export async function isLoginFormVisible(driver: PageDriver): Promise<boolean> {
  return (await driver.probeControl(EMAIL_INPUT)) !== null
    || (await driver.probeControl(PASSWORD_INPUT)) !== null;
}

async function submit(driver: PageDriver, timeoutMs: number): Promise<void> {
  const button = await driver.findControl(SUBMIT_BUTTON, timeoutMs);
  await driver.click(button);
}

async function enterUsername(driver: PageDriver, username: string, timeoutMs: number): Promise<void> {
  const email = await driver.probeControl(EMAIL_INPUT);
  if (!email) return;
  log.info('[login] entering account name');
  await driver.fill(email, username);
  await submit(driver, timeoutMs);
}

async function enterPassword(driver: PageDriver, password: string, timeoutMs: number): Promise<void> {
  const shown = await driver.waitForEvent(PASSWORD_INPUT, timeoutMs);
  if (!shown) {
    if (await driver.probeControl(CREDENTIAL_ERROR)) {
      throw new AuthenticationError('USERNAME_REJECTED', 'account name was not accepted');
    }
    throw new AuthenticationError('PASSWORD_FIELD_MISSING', `password field not shown within ${timeoutMs}ms`);
  }
  const field = await driver.findControl(PASSWORD_INPUT, timeoutMs);
  log.info('[login] entering password');
  await driver.fill(field, password);
  await submit(driver, timeoutMs);
}

/**
 * Waits out a verification (MFA) prompt. Nothing here answers the challenge: someone has
 * to approve it on their device, or the run fails once `verificationMs` passes.
 */
async function awaitVerification(driver: PageDriver, timeoutMs: number): Promise<void> {
  log.warn(
    `[login] additional verification requested; approve it within ${Math.round(timeoutMs / 1000)}s ` +
    '(may require manual intervention)',
  );
  const passed = await driver.waitForEvent(POST_VERIFICATION_SIGNAL, timeoutMs);
  if (!passed) {
    throw new AuthenticationError('VERIFICATION_TIMEOUT', `verification not completed within ${timeoutMs}ms`);
  }
  log.info('[login] verification completed');
}

export async function logIn(
  driver: PageDriver,
  credentials: Credentials,
  timeouts: Pick<StageTimeouts, 'navigationMs' | 'verificationMs'>,
): Promise<LoginOutcome> {
  const outcome: LoginOutcome = { verificationPrompted: false, staySignedInAccepted: false };

  await enterUsername(driver, credentials.username, timeouts.navigationMs);
  await enterPassword(driver, credentials.password, timeouts.navigationMs);

  const signalled = await driver.waitForEvent(POST_PASSWORD_SIGNAL, timeouts.navigationMs);
  if (await driver.probeControl(CREDENTIAL_ERROR)) {
    throw new AuthenticationError('CREDENTIALS_REJECTED', 'sign-in page reported a credential error');
  }
  if (signalled && await driver.probeControl(VERIFICATION_PROMPT)) {
    outcome.verificationPrompted = true;
    await awaitVerification(driver, timeouts.verificationMs);
  }

  const staySignedIn = await driver.probeControl(STAY_SIGNED_IN_PROMPT);
  if (staySignedIn) {
    const accept = await driver.findControl(STAY_SIGNED_IN_ACCEPT, timeouts.navigationMs);
    await driver.click(accept);
    outcome.staySignedInAccepted = true;
    log.info('[login] accepted "stay signed in"');
  }

  if (await isLoginFormVisible(driver)) {
    throw new AuthenticationError('LOGIN_FORM_STILL_VISIBLE', 'still on the sign-in page after submitting credentials');
  }
  log.success('[login] signed in');
  return outcome;
}
