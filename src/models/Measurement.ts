import { Schema, model } from 'mongoose';
import { IMeasurement } from '@/types/measurement.types';

const measurementSchema = new Schema<IMeasurement>({
  device_id: {
    type: String,
    required: true,
    ref: 'Device'
  },
  timestamp: {
    type: Date,
    required: true
  },
  depth_mm: { type: Number, default: null },
  velocity_mps: { type: Number, default: null },
  flow_lps: { type: Number, default: null }
}, {
  timestamps: { createdAt: 'created_at', updatedAt: false },
  collection: 'measurements'
});

// At most one row per observed instant; enforced by MongoDB, not by callers
measurementSchema.index({ device_id: 1, timestamp: 1 }, { unique: true, name: 'uniq_device_time' });
measurementSchema.index({ device_id: 1, timestamp: -1 }, { name: 'idx_device_timestamp' });
measurementSchema.index({ timestamp: -1 });

const Measurement = model<IMeasurement>('Measurement', measurementSchema);

export default Measurement;
