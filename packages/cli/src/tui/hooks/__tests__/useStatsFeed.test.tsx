import { AbortError } from "@fedora-l10n/core";
import { Text } from "ink";
import { render } from "ink-testing-library";
import { describe, expect, it, vi } from "vitest";
import { type FeedContext, useStatsFeed } from "../useStatsFeed.js";

type Load = (context: FeedContext<number>) => Promise<string>;

function Probe({ load, reloadKey = 0 }: { load: Load; reloadKey?: number }) {
  const feed = useStatsFeed(load, [reloadKey]);
  const error = feed.error instanceof Error ? feed.error.message : "none";
  return (
    <Text>
      data={feed.data ?? "-"} loading={String(feed.loading)} progress={feed.progress ?? "-"} error={error}
    </Text>
  );
}

describe("useStatsFeed", () => {
  it("reports progress and then the data", async () => {
    let finish: (value: string) => void = () => {};
    let report: (progress: number) => void = () => {};
    const load = vi.fn<Load>(
      ({ onProgress }) =>
        new Promise((resolve) => {
          report = onProgress;
          finish = resolve;
        })
    );

    const { lastFrame } = render(<Probe load={load} />);
    await vi.waitFor(() => expect(load).toHaveBeenCalledTimes(1));

    report(3);
    await vi.waitFor(() => expect(lastFrame()).toBe("data=- loading=true progress=3 error=none"));

    finish("ready");
    await vi.waitFor(() => expect(lastFrame()).toBe("data=ready loading=false progress=- error=none"));
  });

  it("keeps the last data when a reload fails", async () => {
    const load = vi
      .fn<Load>()
      .mockResolvedValueOnce("first")
      .mockRejectedValueOnce(new Error("offline"));

    const { lastFrame, rerender } = render(<Probe load={load} />);
    await vi.waitFor(() => expect(lastFrame()).toBe("data=first loading=false progress=- error=none"));

    rerender(<Probe load={load} reloadKey={1} />);
    await vi.waitFor(() => expect(lastFrame()).toBe("data=first loading=false progress=- error=offline"));
  });

  it("aborts the load on unmount and ignores the abort", async () => {
    let signal: AbortSignal | undefined;
    const load = vi.fn<Load>(
      (context) =>
        new Promise((_resolve, reject) => {
          signal = context.signal;
          context.signal.addEventListener("abort", () => reject(new AbortError()));
        })
    );

    const { unmount } = render(<Probe load={load} />);
    await vi.waitFor(() => expect(load).toHaveBeenCalledTimes(1));

    unmount();

    expect(signal?.aborted).toBe(true);
  });
});
