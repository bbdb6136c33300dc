import nodemailer, { type Transporter } from "nodemailer";
import { describeError, type DeployLog } from "./log.mts";

export type Transcript = {
  repository: string;
  environment: string;
  commitSha: string;
  succeeded: boolean;
  recipients: readonly string[];
};

/**
 * Creates the mail transport: SMTP when a URL is configured, the local
 * sendmail binary otherwise.
 */
export function createMailTransport(smtpUrl?: string): Transporter {
  return smtpUrl != null
    ? nodemailer.createTransport(smtpUrl)
    : nodemailer.createTransport({ sendmail: true, newline: "unix" });
}

export function transcriptSubject(transcript: Transcript): string {
  return `[${transcript.repository}] ${transcript.environment} deployment ${
    transcript.succeeded ? "succeeded" : "failed"
  } (${transcript.commitSha.slice(0, 7)})`;
}

/**
 * Mails the invocation's log transcript as a single message. The collector is
 * drained here, so this runs once per invocation. A failed send is logged to
 * the console and otherwise ignored.
 * @returns Whether a message was sent.
 */
export async function sendTranscript(
  transport: Transporter,
  from: string,
  transcript: Transcript,
  log: DeployLog
): Promise<boolean> {
  const lines = log.drain();
  if (transcript.recipients.length === 0) {
    console.debug(`[${log.reqId}] No log recipients, skipping notification`);
    return false;
  }

  try {
    await transport.sendMail({
      from,
      to: [...transcript.recipients],
      subject: transcriptSubject(transcript),
      text: lines.join("\n") + "\n",
    });
    console.debug(
      `[${log.reqId}] Sent log transcript to ${transcript.recipients.join(", ")}`
    );
    return true;
  } catch (err) {
    console.error(
      `[${log.reqId}] Failed to send log transcript: ${describeError(err)}`
    );
    return false;
  }
}
