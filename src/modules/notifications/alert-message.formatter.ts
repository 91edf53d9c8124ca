import { Injectable } from '@nestjs/common';

import {
  NotificationKind,
  type NotificationIntent,
  type TransactionEvent,
  TransferDirection,
} from '../../common/interfaces/events/transaction-event.interfaces';
import { AppConfigService } from '../../config/app-config.service';

const SHORT_SIGNATURE_EDGE_LENGTH = 8;
const USD_FORMAT: Intl.NumberFormat = new Intl.NumberFormat('en-US', {
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
});

/** Renders notification intents as Telegram HTML messages. */
@Injectable()
export class AlertMessageFormatter {
  public constructor(private readonly appConfigService: AppConfigService) {}

  public format(intent: NotificationIntent): string {
    const event: TransactionEvent = intent.payload;
    const rows: string[] = [
      this.buildHeader(intent.kind, event),
      `⏰ <b>Time:</b> ${this.formatTimestamp(event.timestamp)}`,
      `💰 <b>Value (USD):</b> $${USD_FORMAT.format(event.amount)}`,
      `📊 <b>Amount:</b> ${escapeHtml(this.formatTokenAmount(event))}`,
      `🔗 <b>Signature:</b> ${this.formatSignatureLink(event.signature)}`,
      `📤 <b>Sender:</b> <code>${escapeHtml(event.senderAddress)}</code>`,
      `📥 <b>Receiver:</b> <code>${escapeHtml(event.receiverAddress)}</code>`,
    ];

    return rows.join('\n');
  }

  private buildHeader(kind: NotificationKind, event: TransactionEvent): string {
    if (kind === NotificationKind.WHALE_ALERT) {
      const tokenLabel: string = event.tokenSymbol ?? event.tokenMint;
      return `🐋 <b>Whale transfer</b> ${escapeHtml(tokenLabel)}`;
    }

    const actionLabel: string = event.direction === TransferDirection.IN ? 'received' : 'sent';
    return `🔔 <b>Wallet ${actionLabel}</b> <code>${escapeHtml(event.walletOrToken)}</code>`;
  }

  // yyyy-mm-dd hh:mm:ss UTC
  private formatTimestamp(timestampSec: number): string {
    const iso: string = new Date(timestampSec * 1000).toISOString();
    return `${iso.slice(0, 10)} ${iso.slice(11, 19)} UTC`;
  }

  private formatTokenAmount(event: TransactionEvent): string {
    if (event.tokenAmount === null) {
      return 'n/a';
    }

    return `${String(event.tokenAmount)} ${event.tokenSymbol ?? event.tokenMint}`;
  }

  private formatSignatureLink(signature: string): string {
    const label: string =
      signature.length > SHORT_SIGNATURE_EDGE_LENGTH * 2
        ? `${signature.slice(0, SHORT_SIGNATURE_EDGE_LENGTH)}...${signature.slice(-SHORT_SIGNATURE_EDGE_LENGTH)}`
        : signature;
    const url: string = `${this.appConfigService.solscanTxBaseUrl}${encodeURIComponent(signature)}`;

    return `<a href="${escapeHtml(url)}">${escapeHtml(label)}</a>`;
  }
}

const escapeHtml = (value: string): string =>
  value
    .replaceAll('&', '&amp;')
    .replaceAll('<', '&lt;')
    .replaceAll('>', '&gt;')
    .replaceAll('"', '&quot;');
