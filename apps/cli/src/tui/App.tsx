import React, { useCallback, useState } from "react";
import { Box, useApp } from "ink";
import type { GameSession } from "../services/GameSession.js";
import { StatusBar } from "./components/StatusBar.js";
import { GameBoard } from "./screens/GameBoard.js";
import { GameOver } from "./screens/GameOver.js";

interface AppProps {
  session: GameSession;
  logPath: string;
}

/**
 * Terminal shell around a GameSession. All game state lives in the session;
 * the shell only keeps the latest snapshot and the last rejection notice.
 */
export function App({ session, logPath }: AppProps) {
  const { exit } = useApp();
  const [snapshot, setSnapshot] = useState(() => session.snapshot());
  const [notice, setNotice] = useState("");
  const { markers } = session.settings;

  const handleDrop = useCallback(
    (column: number) => {
      const result = session.drop(column);
      setNotice(result.kind === "rejected" ? result.message : "");
      setSnapshot(session.snapshot());
    },
    [session]
  );

  const handlePlayAgain = useCallback(() => {
    session.playAgain();
    setNotice("");
    setSnapshot(session.snapshot());
  }, [session]);

  return (
    <Box flexDirection="column">
      <StatusBar rows={snapshot.rows} columns={snapshot.columns} logPath={logPath} />

      {snapshot.phase.status === "in_progress" ? (
        <GameBoard
          snapshot={snapshot}
          markers={markers}
          notice={notice}
          onDrop={handleDrop}
          onQuit={exit}
        />
      ) : (
        <GameOver
          snapshot={snapshot}
          markers={markers}
          onPlayAgain={handlePlayAgain}
          onQuit={exit}
        />
      )}
    </Box>
  );
}
