/**
 * Notice sender that records requests and answers with a set outcome, for tests
 */

import { INoticeSender, NoticeRequest } from '../domain/ports/notice-sender.interface';
import { DispatchOutcome, sent } from '../domain/models/dispatch-outcome';

export class RecordingNoticeSender implements INoticeSender {
  requests: NoticeRequest[] = [];

  constructor(public outcome: DispatchOutcome = sent('ses-1')) {}

  async send(request: NoticeRequest): Promise<DispatchOutcome> {
    this.requests.push(request);
    return this.outcome;
  }
}
