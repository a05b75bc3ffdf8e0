import React from 'react';
import { clsx } from 'clsx';

interface ChartCardProps {
  heading: string;
  title: string;
  className?: string;
  children: React.ReactNode;
}

export const ChartCard: React.FC<ChartCardProps> = ({ heading, title, className, children }) => (
  <section className={clsx('bg-white p-5 rounded-lg border border-border-light shadow-sm', className)}>
    <h3 className="text-sm font-semibold text-text-main">{heading}</h3>
    <p className="text-xs text-text-dim mt-0.5 mb-4">{title}</p>
    {children}
  </section>
);
