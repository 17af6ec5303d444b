export const workflow = {
  name: 'GPU Stack Inspection',
  description:
    'Attach gdb to a stopped oneAPI process or core dump, enumerate CPU and GPU threads (optionally per SIMD lane), and collect their backtraces.',
};
