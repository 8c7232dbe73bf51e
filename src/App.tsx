import { useEffect, useState } from "react";
import { Box, useApp, useInput } from "ink";
import Header from "./components/Header";
import KeyHints from "./components/KeyHints";
import StatusBanner from "./components/StatusBanner";
import type { Session } from "./engine/session";
import { useSession } from "./hooks/useSession";
import { KEY_HINTS, mapKey } from "./keymap";
import InputPage from "./pages/InputPage";
import ResultsPage from "./pages/ResultsPage";
import RunningPage from "./pages/RunningPage";

type Props = {
  session: Session;
  timeoutMs: number;
  distro?: string;
};

export default function App({ session, timeoutMs, distro }: Props) {
  const { exit } = useApp();
  const frame = useSession(session);
  const [draft, setDraft] = useState("");

  useInput((input, key) => {
    const command = mapKey(session.screen, session.mode, input, key, draft);
    if (command.kind === "edit") {
      setDraft(command.draft);
    } else if (command.kind === "dispatch") {
      session.dispatch(command.action);
      if (command.clearDraft) setDraft("");
    }
  });

  useEffect(() => {
    if (session.shouldQuit) exit();
  });

  const run = session.run;

  return (
    <Box flexDirection="column" paddingX={1}>
      <Header mode={session.mode} distro={distro} />
      {session.screen === "input" && (
        <InputPage mode={session.mode} targets={session.targets} draft={draft} error={session.inputError} />
      )}
      {session.screen === "running" && (
        <RunningPage
          frame={frame}
          completed={run.completed}
          total={run.total}
          current={run.currentTarget}
          last={run.lastResult}
          best={session.best}
          timeoutMs={timeoutMs}
        />
      )}
      {session.screen === "results" && (
        <ResultsPage
          mode={session.mode}
          results={session.sortedResults}
          sort={session.sort}
          best={session.best}
          runStatus={run.status}
        />
      )}
      <StatusBanner status={session.status} />
      <KeyHints hints={KEY_HINTS[session.screen](session.mode)} />
    </Box>
  );
}
