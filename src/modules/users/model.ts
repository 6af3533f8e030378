import mongoose, { Schema, type Model } from "mongoose";

import { CONTACT_KEY_MAX, CONTACT_KEY_MIN } from "./contactKey.js";

export interface UserAttrs {
  username: string;
  email: string;

  /** Shareable 9-digit key used to address friend requests; immutable once set. */
  contactKey: number;

  /** Security */
  passwordHash: string;

  /** Account flags */
  isActive: boolean;
  isStaff: boolean;
  isSuperuser: boolean;

  /** Timestamps (from { timestamps: true }) */
  createdAt: Date;
  updatedAt: Date;
}

export interface UserDoc extends mongoose.Document, UserAttrs {}

const UserSchema = new Schema<UserDoc>(
  {
    username: { type: String, required: true, unique: true, trim: true, maxlength: 255 },
    email: {
      type: String,
      required: true,
      unique: true,
      lowercase: true,
      trim: true,
      maxlength: 255,
      match: [/.+@.+\..+/, "Must use a valid email address"],
    },
    contactKey: {
      type: Number,
      required: true,
      unique: true,
      immutable: true,
      min: CONTACT_KEY_MIN,
      max: CONTACT_KEY_MAX,
    },
    passwordHash: { type: String, required: true, select: false },
    isActive: { type: Boolean, default: true },
    isStaff: { type: Boolean, default: false },
    isSuperuser: { type: Boolean, default: false },
  },
  { timestamps: true, versionKey: false }
);

UserSchema.index({ isSuperuser: 1 });

export const User: Model<UserDoc> =
  mongoose.models.User || mongoose.model<UserDoc>("User", UserSchema);
