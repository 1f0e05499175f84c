import CDP from "chrome-remote-interface";
import * as chromeLauncher from "chrome-launcher";
import { z } from "zod";
import { HarnessError, errorMessage } from "../errors.js";
import type { PageDriver } from "../types.js";
import { CdpPage, type CdpTarget } from "./page.js";

/** The Target-domain slice of a browser-level CDP client. */
export interface CdpBrowser {
  Target: {
    createBrowserContext(params: { disposeOnDetach?: boolean }): Promise<{ browserContextId: string }>;
    createTarget(params: { url: string; browserContextId?: string }): Promise<{ targetId: string }>;
    closeTarget(params: { targetId: string }): Promise<unknown>;
    disposeBrowserContext(params: { browserContextId: string }): Promise<unknown>;
  };
  close(): Promise<void>;
}

export type TargetConnector = (targetId: string) => Promise<CdpTarget>;

export interface LaunchOptions {
  /** Attach to a running browser (ws://host:port/... or http://host:port) instead of launching one. */
  cdpUrl?: string;
  headless?: boolean;
}

const VersionInfo = z.object({ webSocketDebuggerUrl: z.string() });

interface LaunchedChrome {
  port: number;
  kill: () => unknown;
}

/**
 * One browser, many isolated contexts. Each `newContext()` gets its own
 * cookies, storage and therefore its own server-side session.
 */
export class BrowserSession {
  private readonly open = new Set<PageDriver>();

  constructor(
    private readonly browser: CdpBrowser,
    private readonly connectTarget: TargetConnector,
    private readonly chrome: LaunchedChrome | null = null,
  ) {}

  static async launch(opts: LaunchOptions = {}): Promise<BrowserSession> {
    let host = "127.0.0.1";
    let port: number;
    let chrome: LaunchedChrome | null = null;

    try {
      if (opts.cdpUrl) {
        const url = new URL(opts.cdpUrl);
        host = url.hostname;
        port = parseInt(url.port, 10);
      } else {
        const flags = ["--no-first-run", "--no-default-browser-check", "--window-size=1400,900"];
        if (opts.headless !== false) flags.push("--headless=new");
        chrome = await chromeLauncher.launch({ chromeFlags: flags });
        port = chrome.port;
      }

      const response = await fetch(`http://${host}:${port}/json/version`);
      const version = VersionInfo.parse(await response.json());
      const browser: CdpBrowser = await CDP({ target: version.webSocketDebuggerUrl });
      const connectTarget: TargetConnector = (targetId) => CDP({ host, port, target: targetId });
      console.error(`[settlecheck] Browser connected on ${host}:${port}`);
      return new BrowserSession(browser, connectTarget, chrome);
    } catch (err) {
      if (chrome) await chrome.kill();
      throw new HarnessError("BROWSER_LAUNCH_FAILED", `Could not start browser: ${errorMessage(err)}`, {
        cause: err,
      });
    }
  }

  async newContext(): Promise<PageDriver> {
    const { browserContextId } = await this.browser.Target.createBrowserContext({ disposeOnDetach: true });
    let targetId: string | null = null;
    let page: CdpPage | null = null;
    try {
      ({ targetId } = await this.browser.Target.createTarget({ url: "about:blank", browserContextId }));
      const pageTargetId = targetId;
      const target = await this.connectTarget(pageTargetId);

      const opened: CdpPage = new CdpPage(target, async () => {
        this.open.delete(opened);
        try {
          await this.browser.Target.closeTarget({ targetId: pageTargetId });
        } finally {
          await this.browser.Target.disposeBrowserContext({ browserContextId });
        }
      });
      page = opened;
      this.open.add(opened);
      await opened.enable();
      return opened;
    } catch (err) {
      await this.discard(browserContextId, targetId, page);
      throw new HarnessError("CDP_DISCONNECTED", `Could not open browser context: ${errorMessage(err)}`, {
        cause: err,
      });
    }
  }

  // Cleanup after a failed newContext(); the error that caused it is the one rethrown.
  private async discard(browserContextId: string, targetId: string | null, page: CdpPage | null): Promise<void> {
    try {
      if (page) {
        await page.close();
        return;
      }
      if (targetId) await this.browser.Target.closeTarget({ targetId });
      await this.browser.Target.disposeBrowserContext({ browserContextId });
    } catch (err) {
      console.error(`[settlecheck] Cleanup of context ${browserContextId} failed: ${errorMessage(err)}`);
    }
  }

  /** Closes every open page, then the browser connection, then Chrome itself. */
  async close(): Promise<void> {
    for (const page of [...this.open]) {
      try {
        await page.close();
      } catch (err) {
        console.error(`[settlecheck] Closing page failed: ${errorMessage(err)}`);
      }
    }
    try {
      await this.browser.close();
    } finally {
      if (this.chrome) await this.chrome.kill();
    }
  }
}
