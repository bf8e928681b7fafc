import mongoose, { Schema, Document, Types } from 'mongoose';
import { EmailLogStatus } from '../utils/constants.js';

export interface IEmailLog extends Document {
  _id: Types.ObjectId;
  to: string;
  subject: string;
  template: string;
  data: Map<string, string>;
  status: EmailLogStatus;
  attempts: number;
  lastAttemptAt: Date | null;
  nextRetryAt: Date | null;
  errorMessage: string | null;
  createdAt: Date;
  updatedAt: Date;
}

const emailLogSchema = new Schema<IEmailLog>(
  {
    to: { type: String, required: true },
    subject: { type: String, required: true },
    template: { type: String, required: true },
    data: { type: Map, of: String, default: {} },
    status: {
      type: String,
      enum: Object.values(EmailLogStatus),
      default: EmailLogStatus.PENDING,
    },
    attempts: { type: Number, default: 0 },
    lastAttemptAt: { type: Date, default: null },
    nextRetryAt: { type: Date, default: null },
    errorMessage: { type: String, default: null },
  },
  { timestamps: true },
);

emailLogSchema.index({ status: 1, nextRetryAt: 1 });
emailLogSchema.index({ to: 1, createdAt: -1 });

export const EmailLog = mongoose.model<IEmailLog>('EmailLog', emailLogSchema);
