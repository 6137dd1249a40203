import type { Account } from '../../../domain/account/account.js';
import { balanceOf } from '../../../domain/account/account.js';
import type { LoginAttempt } from '../../../domain/auth/loginAttempt.js';

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, (char) => HTML_ESCAPES[char] ?? char);
}

const layout = (title: string, body: string) => `<!DOCTYPE html>
<html>
  <head>
    <meta charset="UTF-8">
    <meta name="viewport" content="width=device-width, initial-scale=1.0">
    <title>${escapeHtml(title)} - BankStack</title>
    <link rel="stylesheet" href="/static/style.css">
  </head>
  <body>
    <main class="box">
      <h1>BankStack</h1>
${body}
    </main>
  </body>
</html>`;

// Status page for the service root
export const statusPage = (serviceName: string) =>
  `<h3>${escapeHtml(serviceName)} is up!</h3>`;

export const registerPage = () =>
  layout(
    'Register',
    `      <h2>Create your login</h2>
      <form method="post" action="/register">
        <label>Email <input type="email" name="email" required></label>
        <label>Password <input type="password" name="password" required></label>
        <button type="submit">Register</button>
      </form>
      <p><a href="/login">Already registered? Log in</a></p>`
  );

export interface LoginPageOptions {
  sessionExpired: boolean;
}

export const loginPage = ({ sessionExpired }: LoginPageOptions) =>
  layout(
    'Login',
    `${sessionExpired ? '      <p class="notice">Your session has expired. Please log in again.</p>\n' : ''}      <h2>Log in</h2>
      <form method="post" action="/login">
        <label>Email <input type="email" name="email" required></label>
        <label>Password <input type="password" name="password" required></label>
        <button type="submit">Log in</button>
      </form>
      <p><a href="/register">Register</a> · <a href="/forgot-password">Forgot password?</a></p>`
  );

export interface ForgotPasswordPageOptions {
  /** Email a (mocked) reset link was sent to. */
  sentTo?: string;
}

export const forgotPasswordPage = ({ sentTo }: ForgotPasswordPageOptions = {}) =>
  layout(
    'Forgot password',
    sentTo !== undefined
      ? `      <p class="notice">A password reset link has been sent to ${escapeHtml(sentTo)}.</p>
      <p><a href="/login">Back to login</a></p>`
      : `      <h2>Reset your password</h2>
      <form method="post" action="/forgot-password">
        <label>Email <input type="email" name="email" required></label>
        <button type="submit">Send reset link</button>
      </form>
      <p><a href="/login">Back to login</a></p>`
  );

const attemptRow = (attempt: LoginAttempt) =>
  `          <tr><td>${attempt.attemptedAt.toISOString()}</td><td>${escapeHtml(attempt.ipAddress ?? 'unknown')}</td><td>${attempt.outcome}</td></tr>`;

export interface DashboardPageOptions {
  email: string;
  recentAttempts: LoginAttempt[];
  accountUrl: string;
}

export const dashboardPage = ({ email, recentAttempts, accountUrl }: DashboardPageOptions) =>
  layout(
    'Dashboard',
    `      <h2>Welcome, ${escapeHtml(email)}</h2>
      <p><a href="${escapeHtml(accountUrl)}">Your account</a> · <a href="/logout">Log out</a></p>
      <h3>Recent sign-ins</h3>
      <table>
        <thead><tr><th>When</th><th>From</th><th>Outcome</th></tr></thead>
        <tbody>
${recentAttempts.map(attemptRow).join('\n')}
        </tbody>
      </table>`
  );

export interface AccountPageOptions {
  email: string;
  account: Account | null;
  logoutUrl: string;
}

export const accountPage = ({ email, account, logoutUrl }: AccountPageOptions) =>
  layout(
    'Account',
    `      <h2>Account for ${escapeHtml(email)}</h2>
${
  account
    ? `      <dl>
        <dt>Type</dt><dd>${escapeHtml(account.accountType)}</dd>
        <dt>Balance</dt><dd class="balance">${balanceOf(account).toDecimalString()}</dd>
      </dl>`
    : `      <p>You do not have an account yet.</p>
      <form method="post" action="/ui/account">
        <label>Account type <input type="text" name="account_type" value="checking" required></label>
        <button type="submit">Create account</button>
      </form>`
}
      <p><a href="${escapeHtml(logoutUrl)}">Log out</a></p>`
  );

export const errorPage = (status: number, message: string) =>
  layout(
    `Error ${status}`,
    `      <p>Error ${status}: ${escapeHtml(message)}</p>
      <p><a href="javascript:history.back()">&lt; back</a></p>`
  );
