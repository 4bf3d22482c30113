// @vitest-environment jsdom
import React from 'react';
import { cleanup, fireEvent, render, screen } from '@testing-library/react';
import { afterEach, describe, expect, it } from 'vitest';
import App from './App';

function inputById(container: HTMLElement, id: string): HTMLInputElement {
  const input = container.querySelector(`#${id}`);
  if (!(input instanceof HTMLInputElement)) throw new Error(`no input #${id}`);
  return input;
}

describe('App', () => {
  afterEach(() => {
    cleanup();
  });

  it('shows all three results for the default inputs', () => {
    render(<App />);

    expect(screen.getByText('6.198e-11 F')).toBeInTheDocument();
    expect(screen.getByText('61.98 pF')).toBeInTheDocument();
    expect(screen.getByText('0.062 nF')).toBeInTheDocument();
    expect(screen.getByText('2.000 µC/L')).toBeInTheDocument();
    expect(screen.getByText('0.005 s')).toBeInTheDocument();
    expect(screen.getByText('5.108 ms')).toBeInTheDocument();
    expect(screen.getByText('10.000 ms')).toBeInTheDocument();
  });

  it('copies the computed capacitance into the charge density block', () => {
    const { container } = render(<App />);

    fireEvent.click(screen.getByText('Use in charge density'));

    expect(Number(inputById(container, 'dens-capacitance').value)).toBeCloseTo(61.978, 6);
    expect(inputById(container, 'rc-capacitance').value).toBe('100');
    // 61.978 pF · 1000 V over 0.05 L
    expect(screen.getByText('1.240 µC/L')).toBeInTheDocument();
    expect(screen.getByRole('status')).toHaveTextContent('Copied 61.98 pF into charge density');
  });

  it('copies the computed capacitance into the RC block', () => {
    const { container } = render(<App />);

    fireEvent.click(screen.getByText('Use in RC time'));

    expect(Number(inputById(container, 'rc-capacitance').value)).toBeCloseTo(61.978, 6);
    expect(inputById(container, 'dens-capacitance').value).toBe('100');
  });

  it('keeps the other blocks working when one input is invalid', () => {
    render(<App />);

    fireEvent.change(screen.getByLabelText('Plate gap (mm)'), { target: { value: '0' } });

    expect(screen.getByRole('alert')).toHaveTextContent('Capacitance error: gap must be > 0');
    expect(screen.queryByText('Use in charge density')).not.toBeInTheDocument();
    expect(screen.getByText('2.000 µC/L')).toBeInTheDocument();
    expect(screen.getByText('0.005 s')).toBeInTheDocument();
  });

  it('reports an emptied field as not a number', () => {
    render(<App />);

    fireEvent.change(screen.getByLabelText('Plate area (cm²)'), { target: { value: '' } });

    expect(screen.getByRole('alert')).toHaveTextContent('Capacitance error: area must be a finite number');
  });

  it('switches dielectric presets and accepts a custom permittivity', () => {
    render(<App />);

    fireEvent.click(screen.getByText('Plastic bag (εr = 2.5)'));
    expect(screen.getByText('0.022 nF')).toBeInTheDocument();

    fireEvent.click(screen.getByText('Custom'));
    const epsilonR = screen.getByLabelText('Relative permittivity (εr)');
    expect(epsilonR).toHaveValue(4);
    expect(screen.getByText('0.035 nF')).toBeInTheDocument();

    fireEvent.change(epsilonR, { target: { value: '0' } });
    expect(screen.getByRole('alert')).toHaveTextContent('Capacitance error: epsilonR must be > 0');
  });

  it('reports a reversed polarity as a negative density', () => {
    render(<App />);

    fireEvent.change(screen.getByLabelText('Voltage (V)'), { target: { value: '-1000' } });

    expect(screen.getByText('-2.000 µC/L')).toBeInTheDocument();
  });

  it('takes the remaining charge as a percentage', () => {
    render(<App />);
    const remaining = screen.getByLabelText('Remaining charge (%)');

    fireEvent.change(remaining, { target: { value: '100' } });
    expect(screen.getByText('0.000 s')).toBeInTheDocument();
    expect(screen.getByText(/Time to reach 100\.0% remaining/)).toBeInTheDocument();

    fireEvent.change(remaining, { target: { value: '0' } });
    expect(screen.getByRole('alert')).toHaveTextContent('RC time error: remainingFraction must be in (0, 1]');
  });
});
