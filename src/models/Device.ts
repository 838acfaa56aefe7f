import { Schema, model } from 'mongoose';
import { IDevice } from '@/types/device.types';

const deviceSchema = new Schema<IDevice>({
  device_id: {
    type: String,
    required: true,
    unique: true
  },
  name: {
    type: String,
    required: true
  },
  location: {
    type: String,
    default: null
  },
  endpoint: {
    type: String,
    required: true
  },
  locators: {
    type: Schema.Types.Mixed,
    default: {}
  }
}, {
  timestamps: { createdAt: 'created_at', updatedAt: false },
  collection: 'devices',
  minimize: false
});

const Device = model<IDevice>('Device', deviceSchema);

export default Device;
