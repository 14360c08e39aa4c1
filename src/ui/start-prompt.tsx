import React from "react";
import { Box, Text, render, useApp, useInput } from "ink";

type StartPromptProps = {
  host: string;
  port: number;
  count: number;
};

const StartPrompt = ({ host, port, count }: StartPromptProps) => {
  const { exit } = useApp();

  useInput((_input, key) => {
    if (key.return) {
      exit();
    }
  });

  return (
    <Box flexDirection="column">
      <Text>Target: {host}:{port}</Text>
      <Text>{count} scenario(s) queued. Make sure the server is running first.</Text>
      <Text color="cyan">Press Enter to start tests...</Text>
    </Box>
  );
};

export const waitForAcknowledgement = async (props: StartPromptProps): Promise<void> => {
  const app = render(<StartPrompt {...props} />);
  await app.waitUntilExit();
};
