import type { BrowserSession } from '../engines/browser-session.js';
import { WaitTimeoutError } from '../engines/browser-session.js';
import { withSession } from '../lifecycle/session-scope.js';
import { AssertionFailure, assert } from '../runner/assertions.js';
import type { Scenario, ScenarioContext } from '../runner/scenario.js';
import type { HarnessConfig } from '../schemas/index.js';
import {
  PRODUCT_TERMS,
  classifyLanding,
  fitsViewport,
  hasValidationSignal,
  mentionsProduct,
  resolveLoadTime,
} from './page-checks.js';
import { pollUntil } from './poll.js';

export const SELECTORS = {
  productHeading: PRODUCT_TERMS.map((term) => `h1:has-text("${term}")`).join(', '),
  heading: 'h1',
  nav: 'nav',
  signInLink: 'a[href*="signin"], a:has-text("Sign In")',
  email: 'input[type="email"], input[name="email"]',
  password: 'input[type="password"], input[name="password"]',
  submit: 'button[type="submit"], button:has-text("Sign In")',
  roomTitle: 'input[name="title"], input[placeholder*="title" i]',
  roomCode: 'input[name="code"], input[placeholder*="code" i]',
  themeToggle: 'button[aria-label*="theme" i], button[class*="theme"]',
  footer: 'footer',
  footerLinks: 'footer a',
} as const;

export const SIGNIN_PATH = '/auth/signin';
export const CREATE_ROOM_PATH = '/rooms/create';
export const JOIN_ROOM_PATH = '/rooms/join';

type UiBody = (session: BrowserSession, context: ScenarioContext) => Promise<void>;

/** A scenario that runs inside its own browser session. */
export function defineUiScenario(id: string, title: string, body: UiBody): Scenario {
  return {
    id,
    title,
    suite: 'ui',
    run: (context) =>
      withSession(
        () => context.acquireSession(),
        { viewport: context.config.desktopViewport, timeoutMs: context.config.waitTimeoutMs },
        (session) => body(session, context),
        context.logger,
      ),
  };
}

export function pageUrl(config: HarnessConfig, path: string): string {
  return `${config.frontendUrl}${path}`;
}

export const homepage = defineUiScenario('ui.homepage', 'Homepage loads with a product heading', async (session, { config, note }) => {
  await session.goto(pageUrl(config, '/'));
  const title = await session.currentTitle();

  let headingMentionsProduct = true;
  try {
    await session.waitForVisible(SELECTORS.productHeading);
  } catch (error) {
    if (!(error instanceof WaitTimeoutError)) throw error;
    headingMentionsProduct = false;
    note('No h1 mentions the product; falling back to any h1');
    assert(await session.isVisible(SELECTORS.heading), 'Homepage has no visible h1 heading');
  }

  assert(
    headingMentionsProduct || mentionsProduct(title),
    `Neither the page title "${title}" nor an h1 mentions ${PRODUCT_TERMS.join(' / ')}`,
  );
});

export const navigation = defineUiScenario('ui.navigation', 'Navigation bar is visible', async (session, { config, note }) => {
  await session.goto(pageUrl(config, '/'));
  await session.waitForVisible(SELECTORS.nav);

  if (!(await session.isVisible(SELECTORS.signInLink))) {
    note('Sign In link not found in navigation');
  }
});

export const signInForm = defineUiScenario('ui.signin-form', 'Sign-in page shows email and password fields', async (session, { config }) => {
  await session.goto(pageUrl(config, SIGNIN_PATH));
  await session.waitForVisible(SELECTORS.email);
  assert(await session.isVisible(SELECTORS.password), 'Sign-in page has no visible password field');
});

export const signInValidation = defineUiScenario(
  'ui.signin-validation',
  'Empty sign-in submit leaves the email field invalid',
  async (session, { config, note }) => {
    await session.goto(pageUrl(config, SIGNIN_PATH));

    let problem: string | null = null;
    try {
      await session.waitForVisible(SELECTORS.submit);
      await session.click(SELECTORS.submit);
      const state = {
        required: await session.attribute(SELECTORS.email, 'required'),
        className: await session.attribute(SELECTORS.email, 'class'),
        validationMessage: await session.property(SELECTORS.email, 'validationMessage'),
      };
      if (!hasValidationSignal(state)) {
        problem = 'email field shows no required or invalid state after an empty submit';
      }
    } catch (error) {
      problem = `validation state could not be read: ${error instanceof Error ? error.message : String(error)}`;
    }

    if (problem === null) return;
    if (config.strictFormValidation) {
      throw new AssertionFailure(`Sign-in form validation not observed: ${problem}`);
    }
    note(`Validation check inconclusive: ${problem}`);
  },
);

async function visitProtectedRoute(
  session: BrowserSession,
  { config, logger, note }: ScenarioContext,
  path: string,
  formSelector: string,
  formLabel: string,
): Promise<void> {
  await session.goto(pageUrl(config, path));
  try {
    await session.settle();
  } catch (error) {
    if (!(error instanceof WaitTimeoutError)) throw error;
    note(`Page at ${path} never went network-idle; judging the current URL`);
  }

  const currentUrl = await session.currentUrl();
  const landing = classifyLanding(currentUrl, path);

  if (landing === 'elsewhere') {
    throw new AssertionFailure(`Visiting ${path} landed on ${currentUrl}; expected ${path} or a sign-in page`);
  }
  if (landing === 'signin') {
    logger.info({ path, currentUrl }, 'redirected to sign-in');
    return;
  }
  if (!(await session.isVisible(formSelector))) {
    note(`${formLabel} not visible on ${path} (may require auth)`);
  }
}

export const createRoom = defineUiScenario('ui.create-room', 'Create-room route shows the form or redirects to sign-in', (session, context) =>
  visitProtectedRoute(session, context, CREATE_ROOM_PATH, SELECTORS.roomTitle, 'Room title input'),
);

export const joinRoom = defineUiScenario('ui.join-room', 'Join-room route shows the form or redirects to sign-in', (session, context) =>
  visitProtectedRoute(session, context, JOIN_ROOM_PATH, SELECTORS.roomCode, 'Room code input'),
);

export const themeToggle = defineUiScenario('ui.theme-toggle', 'Theme toggle switches the page theme', async (session, { config, note }) => {
  await session.goto(pageUrl(config, '/'));
  await session.waitForLoad();

  if (!(await session.isVisible(SELECTORS.themeToggle))) {
    note('Theme toggle button not found');
    return;
  }

  const before = await session.attribute('html', 'class');
  await session.click(SELECTORS.themeToggle);
  const after = await pollUntil(
    () => session.attribute('html', 'class'),
    (value) => value !== before,
    { timeoutMs: 2_000, intervalMs: 100 },
  );
  assert(after !== before, `Theme toggle did not change the html class (still "${before ?? ''}")`);
});

export const footer = defineUiScenario('ui.footer', 'Footer is present', async (session, { config, logger, note }) => {
  await session.goto(pageUrl(config, '/'));
  await session.waitForLoad();
  await session.scrollToBottom();

  if (!(await session.isVisible(SELECTORS.footer))) {
    note('Footer element not found');
    return;
  }
  const links = await session.count(SELECTORS.footerLinks);
  logger.info({ links }, 'footer found');
});

export const responsive = defineUiScenario('ui.responsive', 'Mobile viewport has no horizontal overflow', async (session, { config, note }) => {
  await session.resize(config.mobileViewport);
  await session.goto(pageUrl(config, '/'));
  await session.waitForLoad();

  const metrics = await session.layoutMetrics();
  assert(
    fitsViewport(metrics, config.overflowTolerancePx),
    `Horizontal scroll detected in mobile view: document is ${metrics.documentWidth}px wide, viewport ${metrics.viewportWidth}px (tolerance ${config.overflowTolerancePx}px)`,
  );

  if (!(await session.isVisible(SELECTORS.heading))) {
    note('Main heading not visible in mobile view');
  }
});

export const loadPerformance = defineUiScenario('ui.load-performance', 'Homepage loads within the time ceiling', async (session, { config, logger }) => {
  const start = performance.now();
  await session.goto(pageUrl(config, '/'));
  await session.waitForLoad();
  const wallClockMs = performance.now() - start;

  const load = resolveLoadTime(await session.navigationTiming(), wallClockMs);
  logger.info({ loadMs: load.ms, source: load.source }, 'page load time');
  assert(
    load.ms < config.loadTimeCeilingMs,
    `Page load time too slow: ${load.ms}ms (${load.source}), ceiling ${config.loadTimeCeilingMs}ms`,
  );
});

export const uiScenarios: Scenario[] = [
  homepage,
  navigation,
  signInForm,
  signInValidation,
  createRoom,
  joinRoom,
  themeToggle,
  footer,
  responsive,
  loadPerformance,
];
