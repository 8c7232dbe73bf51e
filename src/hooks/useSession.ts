import { useEffect, useState } from "react";
import type { Session } from "../engine/session";

export const FRAME_MS = 80;

/**
 * Re-renders on every session change and drives the frame loop: each frame
 * drains pending worker events and advances the spinner while a run is live.
 */
export function useSession(session: Session, frameMs = FRAME_MS): number {
  const [, setVersion] = useState(0);
  const [frame, setFrame] = useState(0);

  useEffect(() => session.subscribe(() => setVersion((v) => v + 1)), [session]);

  useEffect(() => {
    const timer = setInterval(() => {
      session.poll();
      if (session.screen === "running") setFrame((f) => f + 1);
    }, frameMs);
    return () => clearInterval(timer);
  }, [session, frameMs]);

  return frame;
}
