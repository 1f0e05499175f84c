import { z } from "zod";
import { HarnessError, errorMessage } from "../errors.js";
import { awaitCondition, definePolicy } from "../actions/poll.js";
import type {
  ElementMatch,
  PageDriver,
  ProbeSpec,
  RawProbeResult,
  SettleState,
  ViewportSize,
} from "../types.js";
import {
  CLICK_POINT_FN,
  FILL_FN,
  HTML_EXPR,
  LOCATE_FN,
  PROBE_FN,
  READY_STATE_EXPR,
  SCROLL_TO_FN,
  SETTLE_FN,
  URL_EXPR,
  VIEWPORT_EXPR,
  invoke,
} from "./scripts.js";

/** The slice of a CDP page-target client this driver uses. */
export interface CdpTarget {
  Runtime: {
    enable(): Promise<unknown>;
    evaluate(params: { expression: string; returnByValue?: boolean }): Promise<{
      result: { value?: unknown };
      exceptionDetails?: { text: string; exception?: { description?: string } };
    }>;
  };
  Page: {
    enable(): Promise<unknown>;
    navigate(params: { url: string }): Promise<{ errorText?: string }>;
    captureScreenshot(params: { format?: "png" }): Promise<{ data: string }>;
  };
  Emulation: {
    setDeviceMetricsOverride(params: {
      width: number;
      height: number;
      deviceScaleFactor: number;
      mobile: boolean;
    }): Promise<unknown>;
  };
  Input: {
    dispatchMouseEvent(params: {
      type: "mouseMoved" | "mousePressed" | "mouseReleased";
      x: number;
      y: number;
      button?: "left";
      clickCount?: number;
    }): Promise<unknown>;
  };
  close(): Promise<void>;
}

export const PROTOCOL_TIMEOUT_MS = 10000;
const MOBILE_EMULATION_BELOW = 1024;

const ElementMatchList = z.array(z.object({ domPath: z.string(), visible: z.boolean() }));
const ProbeResults = z.array(
  z.object({ present: z.boolean(), value: z.union([z.boolean(), z.number(), z.string(), z.null()]) }),
);
const SettleStateSchema = z.object({
  readyState: z.string(),
  htmxBusy: z.number(),
  runningAnimations: z.number(),
  quietForMs: z.number(),
});
const Point = z.object({ x: z.number(), y: z.number() }).nullable();
const Viewport = z.object({ width: z.number(), height: z.number() });

function protocolError(err: unknown, what: string): HarnessError {
  if (err instanceof HarnessError) return err;
  const message = errorMessage(err);
  const code = /crash/i.test(message) ? "PAGE_CRASHED" : "CDP_DISCONNECTED";
  return new HarnessError(code, `${what}: ${message}`, { cause: err });
}

/**
 * PageDriver over one CDP page target. Every protocol call is bounded by
 * PROTOCOL_TIMEOUT_MS; transport failures surface as infrastructure errors.
 */
export class CdpPage implements PageDriver {
  private closed = false;

  constructor(
    private readonly target: CdpTarget,
    private readonly dispose: () => Promise<void> = async () => {},
  ) {}

  private async call<T>(what: string, fn: () => Promise<T>): Promise<T> {
    if (this.closed) throw new HarnessError("CDP_DISCONNECTED", `${what}: page already closed`);
    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(
        () => reject(new HarnessError("CDP_DISCONNECTED", `${what}: no reply within ${PROTOCOL_TIMEOUT_MS}ms`)),
        PROTOCOL_TIMEOUT_MS,
      );
    });
    try {
      return await Promise.race([fn(), timeout]);
    } catch (err) {
      throw protocolError(err, what);
    } finally {
      clearTimeout(timer);
    }
  }

  private async evaluate<T>(expression: string, schema: z.ZodType<T>, what: string): Promise<T> {
    const { result, exceptionDetails } = await this.call(what, () =>
      this.target.Runtime.evaluate({ expression, returnByValue: true }),
    );
    if (exceptionDetails) {
      const detail = exceptionDetails.exception?.description ?? exceptionDetails.text;
      throw new HarnessError("SCRIPT_ERROR", `${what}: ${detail}`);
    }
    const parsed = schema.safeParse(result.value);
    if (!parsed.success) {
      throw new HarnessError("SCRIPT_ERROR", `${what}: unexpected result ${JSON.stringify(result.value)}`);
    }
    return parsed.data;
  }

  async enable(): Promise<void> {
    await this.call("enable domains", () =>
      Promise.all([this.target.Page.enable(), this.target.Runtime.enable()]),
    );
  }

  currentUrl(): Promise<string> {
    return this.evaluate(URL_EXPR, z.string(), "read url");
  }

  async navigate(url: string, timeoutMs: number): Promise<void> {
    const start = Date.now();
    const { errorText } = await this.call(`navigate ${url}`, () => this.target.Page.navigate({ url }));
    if (errorText) {
      throw new HarnessError("NAVIGATION_FAILED", `navigate ${url}: ${errorText}`);
    }

    const remaining = Math.max(1, timeoutMs - (Date.now() - start));
    const outcome = await awaitCondition<string>(
      async () => {
        const state = await this.evaluate(READY_STATE_EXPR, z.string(), "read readyState");
        return { met: state === "complete", observed: state };
      },
      definePolicy({ initialDelayMs: 50, maxDelayMs: 250, stopAfterMs: remaining }),
    );
    if (outcome.status !== "ok") {
      throw new HarnessError(
        "NAVIGATION_TIMEOUT",
        `navigate ${url}: readyState "${outcome.observed ?? "unknown"}" after ${timeoutMs}ms`,
      );
    }
  }

  async setViewport(size: ViewportSize): Promise<void> {
    await this.call("set viewport", () =>
      this.target.Emulation.setDeviceMetricsOverride({
        width: size.width,
        height: size.height,
        deviceScaleFactor: 1,
        mobile: size.width < MOBILE_EMULATION_BELOW,
      }),
    );
  }

  getViewport(): Promise<ViewportSize> {
    return this.evaluate(VIEWPORT_EXPR, Viewport, "read viewport");
  }

  locate(selector: string): Promise<ElementMatch[]> {
    return this.evaluate(invoke(LOCATE_FN, selector), ElementMatchList, `locate ${selector}`);
  }

  async click(domPath: string): Promise<void> {
    const point = await this.evaluate(invoke(CLICK_POINT_FN, domPath), Point, `click ${domPath}`);
    if (!point) {
      throw new HarnessError("ELEMENT_NOT_READY", `click ${domPath}: element left the document`);
    }
    const { x, y } = point;
    await this.call(`click ${domPath}`, async () => {
      await this.target.Input.dispatchMouseEvent({ type: "mouseMoved", x, y });
      await this.target.Input.dispatchMouseEvent({ type: "mousePressed", x, y, button: "left", clickCount: 1 });
      await this.target.Input.dispatchMouseEvent({ type: "mouseReleased", x, y, button: "left", clickCount: 1 });
    });
  }

  async fill(domPath: string, value: string): Promise<void> {
    const ok = await this.evaluate(invoke(FILL_FN, domPath, value), z.boolean(), `fill ${domPath}`);
    if (!ok) {
      throw new HarnessError("ELEMENT_NOT_READY", `fill ${domPath}: element left the document`);
    }
  }

  async scrollTo(selector: string, top: number): Promise<number> {
    const actual = await this.evaluate(invoke(SCROLL_TO_FN, selector, top), z.number().nullable(), `scroll ${selector}`);
    if (actual === null) {
      throw new HarnessError("ELEMENT_NOT_READY", `scroll ${selector}: no such element`);
    }
    return actual;
  }

  probe(specs: readonly ProbeSpec[]): Promise<RawProbeResult[]> {
    return this.evaluate(invoke(PROBE_FN, specs), ProbeResults, "probe");
  }

  settleState(): Promise<SettleState> {
    return this.evaluate(invoke(SETTLE_FN), SettleStateSchema, "settle state");
  }

  async screenshot(): Promise<Uint8Array> {
    const { data } = await this.call("screenshot", () => this.target.Page.captureScreenshot({ format: "png" }));
    return Buffer.from(data, "base64");
  }

  html(): Promise<string> {
    return this.evaluate(HTML_EXPR, z.string(), "read html");
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    const errors: unknown[] = [];
    try {
      await this.target.close();
    } catch (err) {
      errors.push(err);
    }
    try {
      await this.dispose();
    } catch (err) {
      errors.push(err);
    }
    if (errors.length > 0) {
      throw protocolError(errors[0], "close page");
    }
  }
}
