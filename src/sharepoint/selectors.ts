import type { ControlDescriptor } from '../browser/page_driver';

// Microsoft account sign-in

export const EMAIL_INPUT: ControlDescriptor = {
  name: 'email input',
  selectors: ["//input[@type='email']", 'input[name="loginfmt"]'],
};

export const PASSWORD_INPUT: ControlDescriptor = {
  name: 'password input',
  selectors: ["//input[@type='password']", 'input[name="passwd"]'],
};

export const SUBMIT_BUTTON: ControlDescriptor = {
  name: 'sign-in submit',
  selectors: ["//input[@type='submit']", '#idSIButton9'],
};

export const CREDENTIAL_ERROR: ControlDescriptor = {
  name: 'credential error',
  selectors: ['#usernameError', '#passwordError', '#idTD_Error'],
};

export const VERIFICATION_PROMPT: ControlDescriptor = {
  name: 'verification prompt',
  selectors: [
    '#idDiv_SAOTCAS_Title',
    '#idDiv_SAOTCC_Title',
    '#idRichContext_DisplaySign',
    '[data-testid="displaySign"]',
  ],
};

export const STAY_SIGNED_IN_PROMPT: ControlDescriptor = {
  name: 'stay signed in prompt',
  selectors: ['#KmsiCheckboxField', '#KmsiDescription'],
};

export const STAY_SIGNED_IN_ACCEPT: ControlDescriptor = {
  name: 'stay signed in accept',
  selectors: ['#idSIButton9', '[data-testid="primaryButton"]'],
};

// Document library

export const UPLOAD_BUTTON: ControlDescriptor = {
  name: 'upload button',
  selectors: ["//i[@data-icon-name='upload']", 'button[data-automationid="uploadCommand"]'],
};

export const UPLOAD_FILES_MENU_ITEM: ControlDescriptor = {
  name: 'upload files menu item',
  selectors: [
    "//li[@role='presentation']//span[contains(text(),'Files')]",
    'button[data-automationid="uploadFileCommand"]',
  ],
};

export const UPLOAD_CONFIRMATION: ControlDescriptor = {
  name: 'upload confirmation',
  selectors: ["//div[contains(text(),'Uploaded')]"],
};

function anyOf(name: string, parts: ControlDescriptor[]): ControlDescriptor {
  return { name, selectors: parts.flatMap((part) => part.selectors) };
}

/** Either the sign-in form or the library, once the first page has drawn. */
export const AUTH_STATE = anyOf('auth state', [EMAIL_INPUT, PASSWORD_INPUT, UPLOAD_BUTTON]);

/** Whatever can follow a password submit. */
export const POST_PASSWORD_SIGNAL = anyOf('post-password signal', [
  CREDENTIAL_ERROR,
  VERIFICATION_PROMPT,
  STAY_SIGNED_IN_PROMPT,
  UPLOAD_BUTTON,
]);

/** Whatever can follow an approved verification prompt. */
export const POST_VERIFICATION_SIGNAL = anyOf('post-verification signal', [
  STAY_SIGNED_IN_PROMPT,
  UPLOAD_BUTTON,
]);
