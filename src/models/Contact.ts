import mongoose, { Schema, Document, Types } from 'mongoose';

export interface IContact extends Document {
  _id: Types.ObjectId;
  ownerId: Types.ObjectId;
  firstName: string;
  lastName: string;
  email: string;
  phone: string | null;
  birthday: string | null; // YYYY-MM-DD
  extra: string | null;
  createdAt: Date;
  updatedAt: Date;
}

const contactSchema = new Schema<IContact>(
  {
    ownerId: { type: Schema.Types.ObjectId, ref: 'User', required: true },
    firstName: { type: String, required: true, trim: true, maxlength: 100 },
    lastName: { type: String, required: true, trim: true, maxlength: 100 },
    email: { type: String, required: true, lowercase: true, trim: true, maxlength: 255 },
    phone: { type: String, default: null, trim: true, maxlength: 50 },
    birthday: { type: String, default: null, match: /^\d{4}-\d{2}-\d{2}$/ },
    extra: { type: String, default: null, maxlength: 500 },
  },
  { timestamps: true },
);

// One contact per email per owner
contactSchema.index({ ownerId: 1, email: 1 }, { unique: true });
contactSchema.index({ ownerId: 1, lastName: 1, firstName: 1 });
contactSchema.index({ ownerId: 1, birthday: 1 }, { sparse: true });

export const Contact = mongoose.model<IContact>('Contact', contactSchema);
