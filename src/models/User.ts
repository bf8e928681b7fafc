import mongoose, { Schema, Document, Types } from 'mongoose';
import { Role } from '../utils/constants.js';

export interface IUser extends Document {
  _id: Types.ObjectId;
  email: string;
  password: string;
  role: Role;
  isVerified: boolean;
  avatarUrl: string | null;
  createdAt: Date;
  updatedAt: Date;
}

const userSchema = new Schema<IUser>(
  {
    email: {
      type: String,
      required: true,
      unique: true,
      lowercase: true,
      trim: true,
      maxlength: 255,
    },
    password: { type: String, required: true, select: false },
    role: {
      type: String,
      enum: Object.values(Role),
      required: true,
      default: Role.USER,
    },
    isVerified: { type: Boolean, default: false },
    avatarUrl: { type: String, default: null, maxlength: 500 },
  },
  { timestamps: true },
);

userSchema.index({ role: 1 });

export const User = mongoose.model<IUser>('User', userSchema);
