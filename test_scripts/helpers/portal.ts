import type { LaunchOptions } from '../../src/browser/page_driver';
import {
  CREDENTIAL_ERROR,
  EMAIL_INPUT,
  PASSWORD_INPUT,
  STAY_SIGNED_IN_ACCEPT,
  STAY_SIGNED_IN_PROMPT,
  SUBMIT_BUTTON,
  UPLOAD_BUTTON,
  UPLOAD_CONFIRMATION,
  UPLOAD_FILES_MENU_ITEM,
  VERIFICATION_PROMPT,
} from '../../src/sharepoint/selectors';
import type { StubPageDriver, StubScript } from './stub_driver';

export type PortalOptions = {
  acceptPassword?: boolean;
  verification?: 'approved' | 'pending';
  staySignedInPrompt?: boolean;
  confirmUpload?: boolean;
  /** where the portal lands after sign-in; defaults to the requested URL */
  landingUrl?: string;
  /** a restored session is honoured unless this is false */
  sessionValid?: boolean;
  /** the sign-in form only appears after the page has been waited on */
  lateSignInForm?: boolean;
};

/** A scripted sign-in page + document library, one instance per launched browser. */
export function portalScript(opts: PortalOptions = {}): (launch: LaunchOptions) => StubScript {
  return (launch) => {
    let signedIn = Boolean(launch.sessionState) && opts.sessionValid !== false;
    let requestedUrl = '';

    const completeSignIn = (driver: StubPageDriver): void => {
      signedIn = true;
      driver.hide(EMAIL_INPUT, PASSWORD_INPUT, SUBMIT_BUTTON, VERIFICATION_PROMPT, STAY_SIGNED_IN_PROMPT, STAY_SIGNED_IN_ACCEPT);
      driver.show(UPLOAD_BUTTON);
      driver.url = opts.landingUrl ?? requestedUrl;
    };

    return {
      onNavigate: (driver, url) => {
        requestedUrl = url;
        if (signedIn) {
          driver.show(UPLOAD_BUTTON);
        } else if (!opts.lateSignInForm) {
          driver.show(EMAIL_INPUT, SUBMIT_BUTTON);
        }
      },
      onFirstWait: {
        'auth state': (driver) => {
          if (!signedIn) driver.show(EMAIL_INPUT, SUBMIT_BUTTON);
        },
      },
      onClick: {
        'sign-in submit': (driver) => {
          if (driver.isVisible(EMAIL_INPUT)) {
            driver.hide(EMAIL_INPUT);
            driver.show(PASSWORD_INPUT);
            return;
          }
          driver.hide(PASSWORD_INPUT, SUBMIT_BUTTON);
          if (opts.acceptPassword === false) {
            driver.show(PASSWORD_INPUT, SUBMIT_BUTTON, CREDENTIAL_ERROR);
            return;
          }
          if (opts.verification === 'pending') {
            driver.show(VERIFICATION_PROMPT);
            return;
          }
          if (opts.verification === 'approved' || opts.staySignedInPrompt) {
            if (opts.verification === 'approved') driver.show(VERIFICATION_PROMPT);
            driver.show(STAY_SIGNED_IN_PROMPT, STAY_SIGNED_IN_ACCEPT);
            return;
          }
          completeSignIn(driver);
        },
        'stay signed in accept': completeSignIn,
        'upload button': (driver) => driver.show(UPLOAD_FILES_MENU_ITEM),
      },
      onSetFiles: (driver) => {
        if (opts.confirmUpload !== false) driver.show(UPLOAD_CONFIRMATION);
      },
    };
  };
}
